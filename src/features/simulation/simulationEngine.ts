/**
 * 시뮬레이션 Tick 엔진
 * 1 tick 순서: 기계 생산 → 벨트 이동 → 기계 출력 배출 (순서 고정)
 * 배치·철거 등 명령은 tick 사이에만 호출된다.
 */

import type { FactoryState } from '../../models/types'
import { processMachines } from './machineProcessing'
import { routeBelts } from './beltRouting'
import { distributeOutput } from './outputDistribution'

/** 1 tick 진행 */
export function runOneTick(state: FactoryState): void {
  if (state.exportFlash > 0) state.exportFlash -= 1
  processMachines(state)
  routeBelts(state)
  distributeOutput(state)
  state.totalTicks += 1
}

/** deltaTicks만큼 진행. animFrame은 2^32에서 순환 */
export function tick(state: FactoryState, deltaTicks: number): void {
  if (!Number.isInteger(deltaTicks) || deltaTicks <= 0) return
  for (let i = 0; i < deltaTicks; i++) runOneTick(state)
  state.animFrame = (state.animFrame + deltaTicks) >>> 0
}
