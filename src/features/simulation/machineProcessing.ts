/**
 * 기계 생산 단계 (tick 1단계)
 * 행 우선 순서로 기준 셀을 돌며 레시피 진행.
 * - 입력 부족 → progress 0으로 초기화
 * - 출력 버퍼 가득 참 → progress 유지 (진행 중 작업 보존)
 */

import type { FactoryState, ItemKind, Machine } from '../../models/types'
import { MACHINE_SPECS, exportValue } from '../../data'

function isOutputFull(machine: Machine): boolean {
  return machine.outputBuffer.length >= machine.maxBuffer
}

/** 생산 1개 기록 (세션 품목별 누적 + 기계 통계) */
function recordProduced(state: FactoryState, machine: Machine, item: ItemKind): void {
  machine.outputBuffer.push(item)
  machine.stats.produced += 1
  state.producedCount[item] += 1
}

/** progress 1 증가. 레시피 시간 도달 시 0으로 되돌리고 true */
function advance(machine: Machine): boolean {
  machine.progress += 1
  if (machine.progress < MACHINE_SPECS[machine.kind].recipeTime) return false
  machine.progress = 0
  return true
}

/** 기계 1대 1 tick. 이번 tick에 생산(수출) 완료했으면 true */
export function stepMachine(state: FactoryState, machine: Machine): boolean {
  const recipe = MACHINE_SPECS[machine.kind].recipe
  switch (recipe.type) {
    case 'extract': {
      if (isOutputFull(machine)) return false
      if (!advance(machine)) return false
      recordProduced(state, machine, recipe.outputs[machine.mode])
      return true
    }
    case 'convert': {
      // 첫 입력 품목이 레시피에 없으면 소비하지 않고 대기
      const first = machine.inputBuffer[0]
      const output = first === undefined ? undefined : recipe.outputs[first]
      if (output === undefined) {
        machine.progress = 0
        return false
      }
      if (isOutputFull(machine)) return false
      if (!advance(machine)) return false
      machine.inputBuffer.shift()
      recordProduced(state, machine, output)
      return true
    }
    case 'combine': {
      if (!recipe.inputs.every((item) => machine.inputBuffer.includes(item))) {
        machine.progress = 0
        return false
      }
      if (isOutputFull(machine)) return false
      if (!advance(machine)) return false
      for (const item of recipe.inputs) {
        machine.inputBuffer.splice(machine.inputBuffer.indexOf(item), 1)
      }
      recordProduced(state, machine, recipe.output)
      return true
    }
    case 'export': {
      const item = machine.inputBuffer[0]
      if (item === undefined) {
        machine.progress = 0
        return false
      }
      if (!advance(machine)) return false
      machine.inputBuffer.shift()
      const value = exportValue(item)
      state.money += value
      state.totalExported += 1
      state.totalMoneyEarned += value
      state.exportFlash = state.config.exportFlashTicks
      state.lastExportValue = value
      machine.stats.produced += 1
      machine.stats.revenue += value
      return true
    }
  }
}

/** 전체 기계 1 tick. 가동 tick은 progress > 0 이거나 이번 tick에 완료한 경우 */
export function processMachines(state: FactoryState): void {
  for (const row of state.grid) {
    for (const cell of row) {
      if (cell.type !== 'machine') continue
      const machine = cell.machine
      const completed = stepMachine(state, machine)
      machine.stats.totalTicks += 1
      if (completed || machine.progress > 0) machine.stats.activeTicks += 1
    }
  }
}
