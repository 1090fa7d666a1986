/**
 * 공장 통계 (읽기 전용)
 * 기계 종류별 집계, 가동률, 초당 수입, 출력 막힘, 커서 기계의 입출력 안내 칸.
 */

import type { FactoryState, GridPosition, Machine, MachineKind } from '../../models/types'
import { MACHINE_KINDS, hasInput, hasOutput } from '../../data'
import { getCell, getPerimeterCells, hasAdjacentBelt, machineAt, machineCovering } from '../layout/gridUtils'

export interface KindStats {
  count: number
  produced: number
  revenue: number
  /** 해당 종류 기계 가동률 평균 (0~1) */
  avgUtilization: number
  working: number
  idle: number
  blocked: number
}

export type MachineStatus = 'working' | 'idle' | 'blocked'

export type IoHintRole = 'input' | 'output' | 'both'

export interface IoHint extends GridPosition {
  role: IoHintRole
}

export function machineUtilization(machine: Machine): number {
  const { activeTicks, totalTicks } = machine.stats
  return totalTicks === 0 ? 0 : activeTicks / totalTicks
}

/** 출력 버퍼 가득(수출기 제외) → blocked, progress > 0 → working, 그 외 idle */
export function machineStatus(machine: Machine): MachineStatus {
  if (hasOutput(machine.kind) && machine.outputBuffer.length >= machine.maxBuffer) return 'blocked'
  return machine.progress > 0 ? 'working' : 'idle'
}

function emptyKindStats(): KindStats {
  return { count: 0, produced: 0, revenue: 0, avgUtilization: 0, working: 0, idle: 0, blocked: 0 }
}

export function collectKindStats(state: FactoryState): Record<MachineKind, KindStats> {
  const stats: Record<MachineKind, KindStats> = {
    miner: emptyKindStats(),
    smelter: emptyKindStats(),
    assembler: emptyKindStats(),
    exporter: emptyKindStats(),
    fabricator: emptyKindStats(),
  }
  for (const row of state.grid) {
    for (const cell of row) {
      if (cell.type !== 'machine') continue
      const m = cell.machine
      const s = stats[m.kind]
      s.count += 1
      s.produced += m.stats.produced
      s.revenue += m.stats.revenue
      s.avgUtilization += machineUtilization(m)
      s[machineStatus(m)] += 1
    }
  }
  for (const kind of MACHINE_KINDS) {
    const s = stats[kind]
    if (s.count > 0) s.avgUtilization /= s.count
  }
  return stats
}

/** 누적 수익 / 경과 초. tick 전에는 0 */
export function incomePerSecond(state: FactoryState): number {
  if (state.totalTicks === 0) return 0
  return state.totalMoneyEarned / (state.totalTicks / state.config.ticksPerSecond)
}

/** 출력 버퍼가 가득 찼고 외곽에 벨트가 하나도 없음 */
export function isOutputBlocked(state: FactoryState, anchor: GridPosition): boolean {
  const machine = machineAt(state, anchor)
  if (!machine || !hasOutput(machine.kind)) return false
  if (machine.outputBuffer.length < machine.maxBuffer) return false
  return !hasAdjacentBelt(state, anchor)
}

/** 커서가 가리키는 기계 외곽의 빈 칸과 역할 (입력/출력/둘 다) */
export function computeIoHints(state: FactoryState): IoHint[] {
  const target = machineCovering(state, state.cursor.x, state.cursor.y)
  if (!target) return []
  const input = hasInput(target.machine.kind)
  const output = hasOutput(target.machine.kind)
  const role: IoHintRole = input && output ? 'both' : output ? 'output' : 'input'
  return getPerimeterCells(state, target.anchor)
    .filter(({ x, y }) => getCell(state, x, y)?.type === 'empty')
    .map(({ x, y }) => ({ x, y, role }))
}
