import { describe, it, expect } from 'vitest'
import { createFactoryState } from '../../session'
import { countItems, getBelt, putBelt, putMachine } from '../../test/fixtures'
import { collectRouteIntents, getRoutingPreferences, routeBelts } from './beltRouting'

describe('getRoutingPreferences', () => {
  it('tries right, down, left, up for an item with no source', () => {
    expect(getRoutingPreferences(null)).toEqual(['right', 'down', 'left', 'up'])
  })

  it('tries forward, then clockwise, then counter-clockwise, never back', () => {
    expect(getRoutingPreferences('left')).toEqual(['right', 'down', 'up'])
    expect(getRoutingPreferences('up')).toEqual(['down', 'left', 'right'])
  })
})

describe('routeBelts', () => {
  it('moves a fresh item right and records where it came from', () => {
    const state = createFactoryState()
    putBelt(state, 0, 0, 'iron_ore')
    putBelt(state, 1, 0)
    routeBelts(state)
    expect(getBelt(state, 0, 0).item).toBeNull()
    expect(getBelt(state, 1, 0)).toEqual({ item: 'iron_ore', sourceDirection: 'left' })
  })

  it('turns clockwise when the way forward has no belt', () => {
    const state = createFactoryState()
    putBelt(state, 4, 5)
    putBelt(state, 5, 5, 'iron_ore', 'left')
    putBelt(state, 5, 4)
    putBelt(state, 5, 6)
    routeBelts(state)
    expect(getBelt(state, 5, 6)).toEqual({ item: 'iron_ore', sourceDirection: 'up' })
    expect(getBelt(state, 5, 4).item).toBeNull()
    expect(getBelt(state, 4, 5).item).toBeNull()
  })

  it('never sends an item back toward its source', () => {
    const state = createFactoryState()
    putBelt(state, 4, 5)
    putBelt(state, 5, 5, 'iron_ore', 'left')
    routeBelts(state)
    expect(getBelt(state, 5, 5).item).toBe('iron_ore')
    expect(getBelt(state, 4, 5).item).toBeNull()
  })

  it('feeds an accepting machine and leaves the belt empty', () => {
    const state = createFactoryState()
    putBelt(state, 3, 0, 'iron_ore', 'left')
    const smelter = putMachine(state, 'smelter', 4, 0)
    routeBelts(state)
    expect(smelter.inputBuffer).toEqual(['iron_ore'])
    expect(getBelt(state, 3, 0)).toEqual({ item: null, sourceDirection: 'left' })
  })

  it('passes by a machine that rejects the item', () => {
    const state = createFactoryState()
    putBelt(state, 3, 0, 'gear', 'left')
    putBelt(state, 3, 1)
    const smelter = putMachine(state, 'smelter', 4, 0)
    routeBelts(state)
    expect(smelter.inputBuffer).toEqual([])
    expect(getBelt(state, 3, 1)).toEqual({ item: 'gear', sourceDirection: 'up' })
  })

  it('does not feed a machine whose input is full', () => {
    const state = createFactoryState()
    putBelt(state, 3, 0, 'iron_ore', 'left')
    const smelter = putMachine(state, 'smelter', 4, 0)
    smelter.inputBuffer.push('iron_ore', 'iron_ore', 'iron_ore', 'iron_ore', 'iron_ore')
    routeBelts(state)
    expect(smelter.inputBuffer).toHaveLength(5)
    expect(getBelt(state, 3, 0).item).toBe('iron_ore')
  })

  it('rechecks input room when two belts feed the same machine in one tick', () => {
    const state = createFactoryState()
    putBelt(state, 3, 0, 'iron_ore', 'left')
    putBelt(state, 3, 1, 'copper_ore', 'left')
    const smelter = putMachine(state, 'smelter', 4, 0)
    smelter.inputBuffer.push('iron_ore', 'iron_ore', 'iron_ore', 'iron_ore')
    expect(collectRouteIntents(state).filter((i) => i.type === 'feed')).toHaveLength(2)
    routeBelts(state)
    expect(smelter.inputBuffer).toHaveLength(5)
    expect(getBelt(state, 3, 0).item).toBeNull()
    expect(getBelt(state, 3, 1).item).toBe('copper_ore')
  })

  it('lets the first belt in row-major order win a contested destination', () => {
    const state = createFactoryState()
    putBelt(state, 0, 0, 'iron_ore')
    putBelt(state, 1, 0)
    putBelt(state, 2, 0, 'gear', 'right')
    routeBelts(state)
    expect(getBelt(state, 0, 0).item).toBeNull()
    expect(getBelt(state, 1, 0)).toEqual({ item: 'iron_ore', sourceDirection: 'left' })
    expect(getBelt(state, 2, 0).item).toBe('gear')
  })

  it('moves each item at most one cell per tick', () => {
    const state = createFactoryState()
    putBelt(state, 0, 0, 'iron_ore')
    putBelt(state, 1, 0, 'copper_ore')
    putBelt(state, 2, 0)
    routeBelts(state)
    expect(getBelt(state, 0, 0).item).toBe('iron_ore')
    expect(getBelt(state, 1, 0).item).toBeNull()
    expect(getBelt(state, 2, 0).item).toBe('copper_ore')
  })

  it('conserves items across a busy network', () => {
    const state = createFactoryState()
    const smelter = putMachine(state, 'smelter', 4, 0)
    smelter.inputBuffer.push('iron_ore', 'iron_ore', 'iron_ore')
    for (let x = 0; x < 4; x++) {
      putBelt(state, x, 0, x % 2 === 0 ? 'iron_ore' : null)
      putBelt(state, x, 1, 'copper_ore')
      putBelt(state, x, 2)
    }
    const before = countItems(state)
    for (let i = 0; i < 10; i++) {
      routeBelts(state)
      expect(countItems(state)).toBe(before)
      expect(smelter.inputBuffer.length).toBeLessThanOrEqual(smelter.maxBuffer)
    }
  })
})
