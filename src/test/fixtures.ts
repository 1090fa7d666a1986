/**
 * 테스트용 배치 헬퍼 (자금 차감·로그 없이 그리드에 직접 기록)
 */

import type { Direction, FactoryState, ItemKind, Machine, MachineKind } from '../models/types'
import { createMachine } from '../session'
import { installBelt, installMachine } from '../features/layout/placement'
import { beltAt, machineAt } from '../features/layout/gridUtils'

export function putMachine(state: FactoryState, kind: MachineKind, x: number, y: number): Machine {
  const machine = createMachine(kind, state.config.bufferCapacity)
  installMachine(state, { x, y }, machine)
  return machine
}

export function putBelt(
  state: FactoryState,
  x: number,
  y: number,
  item: ItemKind | null = null,
  sourceDirection: Direction | null = null
): void {
  installBelt(state, { x, y }, { item, sourceDirection })
}

/** 벨트가 없으면 테스트 실패로 이어지도록 예외 */
export function getBelt(state: FactoryState, x: number, y: number) {
  const belt = beltAt(state, x, y)
  if (!belt) throw new Error(`no belt at ${x},${y}`)
  return belt
}

export function getMachine(state: FactoryState, x: number, y: number) {
  const machine = machineAt(state, { x, y })
  if (!machine) throw new Error(`no machine anchored at ${x},${y}`)
  return machine
}

/** 그리드 위(벨트·버퍼)의 물품 총 개수 */
export function countItems(state: FactoryState): number {
  let total = 0
  for (const row of state.grid) {
    for (const cell of row) {
      if (cell.type === 'belt' && cell.belt.item !== null) total += 1
      if (cell.type === 'machine') total += cell.machine.inputBuffer.length + cell.machine.outputBuffer.length
    }
  }
  return total
}
