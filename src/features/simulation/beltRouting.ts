/**
 * 벨트 자동 경로 (tick 2단계)
 * 1패스: 행 우선으로 벨트마다 이동 의도 수집 (상태 변경 없음)
 * 2패스: 기계 투입 → 벨트 간 이동 순으로 적용. 같은 목적지는 먼저 수집된 의도만 반영.
 */

import type { Direction, FactoryState, GridPosition, ItemKind } from '../../models/types'
import { machineAccepts } from '../../data'
import {
  DIRECTIONS,
  beltAt,
  getCell,
  machineAt,
  machineCovering,
  oppositeDirection,
  rotateClockwise,
  rotateCounterClockwise,
  stepFrom,
} from '../layout/gridUtils'

export type RouteIntent =
  | { type: 'feed'; from: GridPosition; anchor: GridPosition }
  | { type: 'move'; from: GridPosition; to: GridPosition; direction: Direction }

const cellKey = (pos: GridPosition) => `${pos.x},${pos.y}`

/**
 * 시도 방향 순서.
 * 들어온 방향이 있으면 전진(반대 방향) → 시계 방향 수직 → 반시계 방향 수직. 들어온 쪽으로는 되돌아가지 않음.
 * 없으면 →↓←↑.
 */
export function getRoutingPreferences(source: Direction | null): Direction[] {
  if (source === null) return [...DIRECTIONS]
  const forward = oppositeDirection(source)
  return [forward, rotateClockwise(forward), rotateCounterClockwise(forward)]
}

/** 입력 버퍼 여유 + 품목 허용 */
function canFeed(state: FactoryState, pos: GridPosition, item: ItemKind): GridPosition | null {
  const target = machineCovering(state, pos.x, pos.y)
  if (!target) return null
  const { anchor, machine } = target
  if (!machineAccepts(machine.kind, item)) return null
  if (machine.inputBuffer.length >= machine.maxBuffer) return null
  return anchor
}

/** 1패스: 물품이 있는 벨트마다 최대 1개의 의도 */
export function collectRouteIntents(state: FactoryState): RouteIntent[] {
  const intents: RouteIntent[] = []
  state.grid.forEach((row, y) => {
    row.forEach((cell, x) => {
      if (cell.type !== 'belt' || cell.belt.item === null) return
      const item = cell.belt.item
      const from = { x, y }
      for (const direction of getRoutingPreferences(cell.belt.sourceDirection)) {
        const to = stepFrom(from, direction)
        const anchor = canFeed(state, to, item)
        if (anchor) {
          intents.push({ type: 'feed', from, anchor })
          return
        }
        const next = getCell(state, to.x, to.y)
        if (next?.type === 'belt' && next.belt.item === null) {
          intents.push({ type: 'move', from, to, direction })
          return
        }
      }
    })
  })
  return intents
}

/** 2패스: 수집된 의도 적용 */
export function applyRouteIntents(state: FactoryState, intents: RouteIntent[]): void {
  // 기계 투입 먼저. 같은 tick에 여러 벨트가 같은 기계로 들어올 수 있으므로 여유 재확인
  for (const intent of intents) {
    if (intent.type !== 'feed') continue
    const belt = beltAt(state, intent.from.x, intent.from.y)
    const machine = machineAt(state, intent.anchor)
    if (!belt || belt.item === null || !machine) continue
    if (machine.inputBuffer.length >= machine.maxBuffer) continue
    machine.inputBuffer.push(belt.item)
    belt.item = null
  }

  const claimed = new Set<string>()
  for (const intent of intents) {
    if (intent.type !== 'move') continue
    const key = cellKey(intent.to)
    if (claimed.has(key)) continue
    const src = beltAt(state, intent.from.x, intent.from.y)
    const dst = beltAt(state, intent.to.x, intent.to.y)
    if (!src || src.item === null || !dst || dst.item !== null) continue
    dst.item = src.item
    dst.sourceDirection = oppositeDirection(intent.direction)
    src.item = null
    claimed.add(key)
  }
}

export function routeBelts(state: FactoryState): void {
  applyRouteIntents(state, collectRouteIntents(state))
}
