import { describe, it, expect } from 'vitest'
import { createFactoryState } from '../../session'
import { putBelt, putMachine } from '../../test/fixtures'
import {
  collectKindStats,
  computeIoHints,
  incomePerSecond,
  isOutputBlocked,
  machineStatus,
  machineUtilization,
} from './factoryStats'

describe('machine status', () => {
  it('reports zero utilization before any tick', () => {
    const state = createFactoryState()
    expect(machineUtilization(putMachine(state, 'miner', 0, 0))).toBe(0)
  })

  it('classifies blocked, working and idle machines', () => {
    const state = createFactoryState()
    const miner = putMachine(state, 'miner', 0, 0)
    miner.progress = 3
    putMachine(state, 'smelter', 2, 0)
    const assembler = putMachine(state, 'assembler', 4, 0)
    assembler.outputBuffer.push('gear', 'gear', 'gear', 'gear', 'gear')
    expect(machineStatus(miner)).toBe('working')
    expect(machineStatus(assembler)).toBe('blocked')
    const stats = collectKindStats(state)
    expect(stats.miner).toMatchObject({ count: 1, working: 1 })
    expect(stats.smelter).toMatchObject({ count: 1, idle: 1 })
    expect(stats.assembler).toMatchObject({ count: 1, blocked: 1 })
    expect(stats.exporter.count).toBe(0)
  })
})

describe('incomePerSecond', () => {
  it('divides earnings by elapsed seconds', () => {
    const state = createFactoryState()
    expect(incomePerSecond(state)).toBe(0)
    state.totalMoneyEarned = 20
    state.totalTicks = 40
    expect(incomePerSecond(state)).toBe(5)
  })
})

describe('isOutputBlocked', () => {
  it('flags a full machine with no belt around it', () => {
    const state = createFactoryState()
    const miner = putMachine(state, 'miner', 0, 0)
    miner.outputBuffer.push('iron_ore', 'iron_ore', 'iron_ore', 'iron_ore', 'iron_ore')
    expect(isOutputBlocked(state, { x: 0, y: 0 })).toBe(true)
    putBelt(state, 2, 1)
    expect(isOutputBlocked(state, { x: 0, y: 0 })).toBe(false)
  })

  it('never flags an exporter', () => {
    const state = createFactoryState()
    putMachine(state, 'exporter', 0, 0)
    expect(isOutputBlocked(state, { x: 0, y: 0 })).toBe(false)
  })
})

describe('computeIoHints', () => {
  it('marks the empty perimeter of the machine under the cursor', () => {
    const state = createFactoryState()
    putMachine(state, 'miner', 5, 5)
    state.cursor = { x: 6, y: 6 }
    expect(computeIoHints(state)).toHaveLength(12)
    expect(computeIoHints(state)[0]).toEqual({ x: 5, y: 4, role: 'output' })
    putBelt(state, 5, 4)
    expect(computeIoHints(state)).toHaveLength(11)
  })

  it('uses the role of the machine kind', () => {
    const state = createFactoryState()
    putMachine(state, 'exporter', 5, 5)
    putMachine(state, 'smelter', 10, 5)
    state.cursor = { x: 5, y: 5 }
    expect(computeIoHints(state)[0].role).toBe('input')
    state.cursor = { x: 10, y: 5 }
    expect(computeIoHints(state)[0].role).toBe('both')
  })

  it('is empty when the cursor is not on a machine', () => {
    const state = createFactoryState()
    expect(computeIoHints(state)).toEqual([])
  })
})
