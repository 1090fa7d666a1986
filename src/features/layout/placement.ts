/**
 * 배치·철거·경제 명령 (tick 사이 동기 호출)
 * 모든 명령은 검증을 마친 뒤에만 상태를 바꾼다. 실패는 false 반환(+필요 시 로그), 예외 없음.
 */

import type { Belt, FactoryState, GridPosition, Machine, MachineKind, PlacementTool } from '../../models/types'
import { MACHINE_SPECS, getRefund, hasInput, hasOutput } from '../../data'
import { addLog, createBelt, createMachine } from '../../session'
import {
  canPlaceAt,
  directionDelta,
  directionFromDelta,
  getCell,
  getFootprintCells,
  hasAdjacentBelt,
  machineCovering,
  rotateClockwise,
  setCell,
} from './gridUtils'

const MODE_LABEL = { iron: '철', copper: '구리' } as const

/** 기준 셀 + 부품 3칸 기록. 호출 전 canPlaceAt 확인 필요 */
export function installMachine(state: FactoryState, anchor: GridPosition, machine: Machine): void {
  for (const { x, y } of getFootprintCells(anchor)) {
    if (x === anchor.x && y === anchor.y) setCell(state, x, y, { type: 'machine', machine })
    else setCell(state, x, y, { type: 'machine_part', anchorX: anchor.x, anchorY: anchor.y })
  }
}

export function installBelt(state: FactoryState, pos: GridPosition, belt: Belt = createBelt()): void {
  setCell(state, pos.x, pos.y, { type: 'belt', belt })
}

function clearFootprint(state: FactoryState, anchor: GridPosition): void {
  for (const { x, y } of getFootprintCells(anchor)) setCell(state, x, y, { type: 'empty' })
}

/** 벨트가 없을 때 안내 2줄 (일반 + 기계 역할별) */
function logConnectionHints(state: FactoryState, kind: MachineKind): void {
  const name = MACHINE_SPECS[kind].name
  addLog(state, `힌트: ${name} 주변에 벨트를 놓아 연결하세요`)
  if (hasInput(kind) && hasOutput(kind)) {
    addLog(state, '벨트로 재료를 넣으면 생산품은 다른 빈 벨트로 나옵니다')
  } else if (hasOutput(kind)) {
    addLog(state, `${name}은(는) 생산품을 주변의 빈 벨트로 내보냅니다`)
  } else {
    addLog(state, `${name}에 닿은 벨트의 물품은 판매됩니다`)
  }
}

/** 커서 위치를 기준 셀로 기계 설치 */
export function placeMachine(state: FactoryState, kind: MachineKind): boolean {
  const { name, cost } = MACHINE_SPECS[kind]
  const anchor = { ...state.cursor }
  if (!canPlaceAt(state, anchor)) {
    addLog(state, `${name}을(를) 여기에 설치할 수 없습니다`)
    return false
  }
  if (state.money < cost) {
    addLog(state, `자금 부족! (${name} $${cost})`)
    return false
  }
  state.money -= cost
  installMachine(state, anchor, createMachine(kind, state.config.bufferCapacity))
  addLog(state, `${name} 설치 (-$${cost})`)
  if (!hasAdjacentBelt(state, anchor)) logConnectionHints(state, kind)
  return true
}

/** 커서 위치에 벨트 설치 후 벨트 방향으로 커서 1칸 전진 */
export function placeBelt(state: FactoryState): boolean {
  const { x, y } = state.cursor
  const cost = state.config.beltCost
  if (getCell(state, x, y)?.type !== 'empty') return false
  if (state.money < cost) {
    addLog(state, `자금 부족! (벨트 $${cost})`)
    return false
  }
  state.money -= cost
  installBelt(state, { x, y })
  addLog(state, `벨트 설치 (-$${cost})`)
  const d = directionDelta(state.beltDirection)
  moveCursor(state, d.x, d.y)
  return true
}

/** 커서 위치 철거. 기계는 비용 절반(내림), 벨트는 beltRefund 환급 */
export function deleteAt(state: FactoryState): boolean {
  const { x, y } = state.cursor
  const cell = getCell(state, x, y)
  if (!cell || cell.type === 'empty') return false
  if (cell.type === 'belt') {
    const refund = state.config.beltRefund
    setCell(state, x, y, { type: 'empty' })
    state.money += refund
    addLog(state, `벨트 철거 (+$${refund})`)
    return true
  }
  const target = machineCovering(state, x, y)
  if (!target) return false
  const { kind } = target.machine
  const refund = getRefund(kind)
  clearFootprint(state, target.anchor)
  state.money += refund
  addLog(state, `${MACHINE_SPECS[kind].name} 철거 (+$${refund})`)
  return true
}

/** 현재 도구로 커서 위치에 설치/철거 */
export function place(state: FactoryState): boolean {
  const tool = state.tool
  if (tool === 'none') return false
  if (tool === 'delete') return deleteAt(state)
  if (tool === 'belt') return placeBelt(state)
  return placeMachine(state, tool)
}

/** 커서 아래 채굴기의 철/구리 모드 전환. 채굴기가 아니면 false */
export function toggleMinerMode(state: FactoryState): boolean {
  const target = machineCovering(state, state.cursor.x, state.cursor.y)
  if (!target || target.machine.kind !== 'miner') return false
  const machine = target.machine
  machine.mode = machine.mode === 'iron' ? 'copper' : 'iron'
  addLog(state, `채굴기 모드: ${MODE_LABEL[machine.mode]}`)
  return true
}

/** 벨트 배치 방향 → ↓ ← ↑ 순환 */
export function rotateBelt(state: FactoryState): void {
  state.beltDirection = rotateClockwise(state.beltDirection)
}

/** 커서 이동 (그리드 범위로 제한). 상하좌우 1칸 이동이면 벨트 방향도 맞춤 */
export function moveCursor(state: FactoryState, dx: number, dy: number): void {
  setCursor(state, state.cursor.x + dx, state.cursor.y + dy)
  const dir = directionFromDelta(dx, dy)
  if (dir) state.beltDirection = dir
}

/** 그리드 클릭 등 절대 위치 지정 (범위 제한, 벨트 방향 유지) */
export function setCursor(state: FactoryState, x: number, y: number): void {
  const { gridWidth, gridHeight } = state.config
  state.cursor = {
    x: Math.min(Math.max(x, 0), gridWidth - 1),
    y: Math.min(Math.max(y, 0), gridHeight - 1),
  }
}

export function selectTool(state: FactoryState, tool: PlacementTool): void {
  state.tool = tool
}

