/**
 * 기계 출력 배출 (tick 3단계)
 * 출력 버퍼의 가장 오래된 물품을 외곽의 첫 빈 벨트로 1개 내보냄.
 * 이 기계로 물품을 넣고 있는 입력 벨트는 건너뜀 (출력이 입력 라인으로 되돌아가지 않게).
 */

import type { Belt, FactoryState, GridPosition } from '../../models/types'
import { hasOutput } from '../../data'
import {
  beltAt,
  directionTowardFootprint,
  getPerimeterCells,
  isInFootprint,
  machineAt,
  oppositeDirection,
  stepFrom,
} from '../layout/gridUtils'

/** 벨트의 들어온 방향 기준 전진 1칸이 이 기계 점유 칸이면 입력 벨트 */
export function isInputBeltFor(anchor: GridPosition, pos: GridPosition, belt: Belt): boolean {
  if (belt.sourceDirection === null) return false
  const ahead = stepFrom(pos, oppositeDirection(belt.sourceDirection))
  return isInFootprint(anchor, ahead.x, ahead.y)
}

/** 기계 1대 배출. 내보냈으면 true */
export function pushOutput(state: FactoryState, anchor: GridPosition): boolean {
  const machine = machineAt(state, anchor)
  if (!machine || !hasOutput(machine.kind) || machine.outputBuffer.length === 0) return false
  for (const pos of getPerimeterCells(state, anchor)) {
    const belt = beltAt(state, pos.x, pos.y)
    if (!belt || belt.item !== null || isInputBeltFor(anchor, pos, belt)) continue
    const item = machine.outputBuffer.shift()
    if (item === undefined) return false
    belt.item = item
    belt.sourceDirection = directionTowardFootprint(anchor, pos)
    return true
  }
  return false
}

export function distributeOutput(state: FactoryState): void {
  state.grid.forEach((row, y) => {
    row.forEach((cell, x) => {
      if (cell.type === 'machine') pushOutput(state, { x, y })
    })
  })
}
