/**
 * 그리드 기하 유틸
 * 방향(→↓←↑) 델타·반대·회전, 기준 셀(anchor) 해석, 2×2 점유 칸·외곽 칸 계산.
 */

import type { Belt, Cell, Direction, FactoryState, GridPosition, Machine } from '../../models/types'
import { MACHINE_SIZE } from '../../models/types'

/** 회전 순서 = 경로 탐색 기본 순서 (→↓←↑) */
export const DIRECTIONS: readonly Direction[] = ['right', 'down', 'left', 'up']

// y 증가 = 아래쪽
const DIRECTION_DELTA: Record<Direction, GridPosition> = {
  right: { x: 1, y: 0 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  up: { x: 0, y: -1 },
}

const OPPOSITE: Record<Direction, Direction> = {
  right: 'left',
  down: 'up',
  left: 'right',
  up: 'down',
}

const ARROW: Record<Direction, string> = { right: '→', down: '↓', left: '←', up: '↑' }

export function directionDelta(dir: Direction): GridPosition {
  return DIRECTION_DELTA[dir]
}

export function oppositeDirection(dir: Direction): Direction {
  return OPPOSITE[dir]
}

export function directionArrow(dir: Direction): string {
  return ARROW[dir]
}

/** 시계 방향 90° (→ ↓ ← ↑ →) */
export function rotateClockwise(dir: Direction): Direction {
  const i = DIRECTIONS.indexOf(dir)
  return DIRECTIONS[(i + 1) % DIRECTIONS.length]
}

export function rotateCounterClockwise(dir: Direction): Direction {
  const i = DIRECTIONS.indexOf(dir)
  return DIRECTIONS[(i + DIRECTIONS.length - 1) % DIRECTIONS.length]
}

/** 단위 이동 (dx,dy) → 방향. 대각선·0이면 null */
export function directionFromDelta(dx: number, dy: number): Direction | null {
  for (const dir of DIRECTIONS) {
    const d = DIRECTION_DELTA[dir]
    if (d.x === dx && d.y === dy) return dir
  }
  return null
}

export function stepFrom(pos: GridPosition, dir: Direction): GridPosition {
  const d = DIRECTION_DELTA[dir]
  return { x: pos.x + d.x, y: pos.y + d.y }
}

export function isInBounds(state: FactoryState, x: number, y: number): boolean {
  return x >= 0 && x < state.config.gridWidth && y >= 0 && y < state.config.gridHeight
}

/** 범위 밖이면 undefined */
export function getCell(state: FactoryState, x: number, y: number): Cell | undefined {
  if (!isInBounds(state, x, y)) return undefined
  return state.grid[y]?.[x]
}

export function setCell(state: FactoryState, x: number, y: number, cell: Cell): void {
  const row = state.grid[y]
  if (row && x >= 0 && x < row.length) row[x] = cell
}

/** 기계 셀(기준·부품) → 기준 셀 좌표. 기계가 아니면 null */
export function anchorOf(state: FactoryState, x: number, y: number): GridPosition | null {
  const cell = getCell(state, x, y)
  if (cell?.type === 'machine') return { x, y }
  if (cell?.type === 'machine_part') return { x: cell.anchorX, y: cell.anchorY }
  return null
}

/** 기준 셀의 기계. 기준 셀이 아니면 null */
export function machineAt(state: FactoryState, anchor: GridPosition): Machine | null {
  const cell = getCell(state, anchor.x, anchor.y)
  return cell?.type === 'machine' ? cell.machine : null
}

/** 임의 기계 셀 → 기계 (anchorOf + machineAt) */
export function machineCovering(state: FactoryState, x: number, y: number): { anchor: GridPosition; machine: Machine } | null {
  const anchor = anchorOf(state, x, y)
  if (!anchor) return null
  const machine = machineAt(state, anchor)
  return machine ? { anchor, machine } : null
}

export function beltAt(state: FactoryState, x: number, y: number): Belt | null {
  const cell = getCell(state, x, y)
  return cell?.type === 'belt' ? cell.belt : null
}

/** 기준 셀 기준 2×2 점유 칸 (기준 셀이 첫 번째) */
export function getFootprintCells(anchor: GridPosition): GridPosition[] {
  const cells: GridPosition[] = []
  for (let dy = 0; dy < MACHINE_SIZE; dy++) {
    for (let dx = 0; dx < MACHINE_SIZE; dx++) {
      cells.push({ x: anchor.x + dx, y: anchor.y + dy })
    }
  }
  return cells
}

export function isInFootprint(anchor: GridPosition, x: number, y: number): boolean {
  return x >= anchor.x && x < anchor.x + MACHINE_SIZE && y >= anchor.y && y < anchor.y + MACHINE_SIZE
}

/** 2×2를 놓을 칸이 모두 범위 안이고 비어 있는지 */
export function canPlaceAt(state: FactoryState, anchor: GridPosition): boolean {
  return getFootprintCells(anchor).every(({ x, y }) => getCell(state, x, y)?.type === 'empty')
}

/**
 * 2×2 외곽 칸 (최대 12칸, 범위 밖 제외).
 * 순서: 위 변(좌→우), 아래 변, 왼쪽 변(위→아래), 오른쪽 변, 모서리(좌상·우상·좌하·우하)
 */
export function getPerimeterCells(state: FactoryState, anchor: GridPosition): GridPosition[] {
  const { x: ax, y: ay } = anchor
  const top = ay - 1
  const bottom = ay + MACHINE_SIZE
  const left = ax - 1
  const right = ax + MACHINE_SIZE
  const candidates: GridPosition[] = []
  for (let i = 0; i < MACHINE_SIZE; i++) candidates.push({ x: ax + i, y: top })
  for (let i = 0; i < MACHINE_SIZE; i++) candidates.push({ x: ax + i, y: bottom })
  for (let i = 0; i < MACHINE_SIZE; i++) candidates.push({ x: left, y: ay + i })
  for (let i = 0; i < MACHINE_SIZE; i++) candidates.push({ x: right, y: ay + i })
  candidates.push({ x: left, y: top }, { x: right, y: top }, { x: left, y: bottom }, { x: right, y: bottom })
  return candidates.filter(({ x, y }) => isInBounds(state, x, y))
}

/**
 * 외곽 칸에서 기계를 향하는 방향.
 * 위·아래 변과 모서리는 세로 방향, 좌·우 변은 가로 방향.
 */
export function directionTowardFootprint(anchor: GridPosition, pos: GridPosition): Direction {
  if (pos.y < anchor.y) return 'down'
  if (pos.y >= anchor.y + MACHINE_SIZE) return 'up'
  return pos.x < anchor.x ? 'right' : 'left'
}

/** 외곽에 벨트가 하나라도 있는지 */
export function hasAdjacentBelt(state: FactoryState, anchor: GridPosition): boolean {
  return getPerimeterCells(state, anchor).some(({ x, y }) => getCell(state, x, y)?.type === 'belt')
}
