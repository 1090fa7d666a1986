import { describe, it, expect } from 'vitest'
import { createFactoryState } from '../../session'
import { getBelt, putBelt, putMachine } from '../../test/fixtures'
import { distributeOutput, isInputBeltFor, pushOutput } from './outputDistribution'

describe('isInputBeltFor', () => {
  it('detects a belt whose forward step lands on the footprint', () => {
    const anchor = { x: 4, y: 0 }
    expect(isInputBeltFor(anchor, { x: 3, y: 0 }, { item: null, sourceDirection: 'left' })).toBe(true)
    expect(isInputBeltFor(anchor, { x: 3, y: 0 }, { item: null, sourceDirection: 'right' })).toBe(false)
    expect(isInputBeltFor(anchor, { x: 3, y: 0 }, { item: null, sourceDirection: null })).toBe(false)
  })
})

describe('distributeOutput', () => {
  it('pushes the oldest output onto an adjacent empty belt pointing away', () => {
    const state = createFactoryState()
    const miner = putMachine(state, 'miner', 0, 0)
    miner.outputBuffer.push('iron_ore', 'copper_ore')
    putBelt(state, 2, 0)
    distributeOutput(state)
    expect(getBelt(state, 2, 0)).toEqual({ item: 'iron_ore', sourceDirection: 'left' })
    expect(miner.outputBuffer).toEqual(['copper_ore'])
  })

  it('skips a belt that is feeding the machine', () => {
    const state = createFactoryState()
    const smelter = putMachine(state, 'smelter', 4, 0)
    smelter.outputBuffer.push('iron_plate')
    putBelt(state, 3, 0, null, 'left')
    putBelt(state, 6, 0)
    distributeOutput(state)
    expect(getBelt(state, 3, 0).item).toBeNull()
    expect(getBelt(state, 6, 0)).toEqual({ item: 'iron_plate', sourceDirection: 'left' })
  })

  it('keeps the item buffered when only input belts touch the machine', () => {
    const state = createFactoryState()
    const smelter = putMachine(state, 'smelter', 4, 0)
    smelter.outputBuffer.push('iron_plate')
    putBelt(state, 3, 0, null, 'left')
    expect(pushOutput(state, { x: 4, y: 0 })).toBe(false)
    expect(smelter.outputBuffer).toEqual(['iron_plate'])
  })

  it('pushes one item per machine per call', () => {
    const state = createFactoryState()
    const miner = putMachine(state, 'miner', 0, 0)
    miner.outputBuffer.push('iron_ore', 'iron_ore')
    putBelt(state, 0, 2)
    putBelt(state, 1, 2)
    distributeOutput(state)
    expect(getBelt(state, 0, 2)).toEqual({ item: 'iron_ore', sourceDirection: 'up' })
    expect(getBelt(state, 1, 2).item).toBeNull()
    expect(miner.outputBuffer).toEqual(['iron_ore'])
  })

  it('uses a corner belt and points it vertically at the machine', () => {
    const state = createFactoryState()
    const miner = putMachine(state, 'miner', 1, 1)
    miner.outputBuffer.push('iron_ore')
    putBelt(state, 0, 0)
    distributeOutput(state)
    expect(getBelt(state, 0, 0)).toEqual({ item: 'iron_ore', sourceDirection: 'down' })
  })

  it('skips belts already carrying an item', () => {
    const state = createFactoryState()
    const miner = putMachine(state, 'miner', 0, 0)
    miner.outputBuffer.push('copper_ore')
    putBelt(state, 0, 2, 'iron_ore')
    putBelt(state, 2, 1)
    distributeOutput(state)
    expect(getBelt(state, 0, 2).item).toBe('iron_ore')
    expect(getBelt(state, 2, 1)).toEqual({ item: 'copper_ore', sourceDirection: 'left' })
  })
})
