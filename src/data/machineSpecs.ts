/**
 * 기계 종류별 스펙: 설치 비용, 레시피 시간(tick), 레시피 형태.
 * 입력 허용 여부(accepts)는 레시피 형태에서 유도.
 */

import type { ItemKind, MachineKind, MinerMode } from '../models/types'

/**
 * 레시피 형태
 * - extract: 입력 없이 모드에 따라 광석 생산 (채굴기)
 * - convert: 첫 입력 품목에 따라 출력 결정 (제련로·조립기)
 * - combine: 모든 입력이 동시에 있어야 생산 (회로 제작기)
 * - export: 입력을 돈으로 변환, 출력 없음 (수출기)
 */
export type RecipeSpec =
  | { type: 'extract'; outputs: Record<MinerMode, ItemKind> }
  | { type: 'convert'; outputs: Partial<Record<ItemKind, ItemKind>> }
  | { type: 'combine'; inputs: readonly ItemKind[]; output: ItemKind }
  | { type: 'export' }

export interface MachineSpec {
  name: string
  symbol: string
  cost: number
  /** 출력 1개당 tick */
  recipeTime: number
  recipe: RecipeSpec
}

export const MACHINE_SPECS: Record<MachineKind, MachineSpec> = {
  miner: {
    name: '채굴기',
    symbol: 'M',
    cost: 10,
    recipeTime: 10,
    recipe: { type: 'extract', outputs: { iron: 'iron_ore', copper: 'copper_ore' } },
  },
  smelter: {
    name: '제련로',
    symbol: 'S',
    cost: 25,
    recipeTime: 15,
    recipe: { type: 'convert', outputs: { iron_ore: 'iron_plate', copper_ore: 'copper_plate' } },
  },
  assembler: {
    name: '조립기',
    symbol: 'A',
    cost: 50,
    recipeTime: 20,
    recipe: { type: 'convert', outputs: { iron_plate: 'gear' } },
  },
  exporter: {
    name: '수출기',
    symbol: 'E',
    cost: 15,
    recipeTime: 5,
    recipe: { type: 'export' },
  },
  fabricator: {
    name: '회로 제작기',
    symbol: 'F',
    cost: 75,
    recipeTime: 25,
    recipe: { type: 'combine', inputs: ['iron_plate', 'copper_plate'], output: 'circuit' },
  },
}

/** 도구 선택 순서 (화면 도구 막대와 동일) */
export const MACHINE_KINDS: readonly MachineKind[] = ['miner', 'smelter', 'assembler', 'exporter', 'fabricator']

/** 철거 시 환급액 (비용의 절반, 내림) */
export function getRefund(kind: MachineKind): number {
  return Math.floor(MACHINE_SPECS[kind].cost / 2)
}

/** 해당 기계 입력 포트가 이 품목을 받는지. 채굴기는 입력 포트 없음 */
export function machineAccepts(kind: MachineKind, item: ItemKind): boolean {
  const recipe = MACHINE_SPECS[kind].recipe
  switch (recipe.type) {
    case 'extract':
      return false
    case 'convert':
      return recipe.outputs[item] !== undefined
    case 'combine':
      return recipe.inputs.includes(item)
    case 'export':
      return true
  }
}

/** 출력 버퍼를 쓰는 기계인지 (수출기 제외) */
export function hasOutput(kind: MachineKind): boolean {
  return MACHINE_SPECS[kind].recipe.type !== 'export'
}

/** 입력 포트가 있는 기계인지 (채굴기 제외) */
export function hasInput(kind: MachineKind): boolean {
  return MACHINE_SPECS[kind].recipe.type !== 'extract'
}
