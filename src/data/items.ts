/**
 * 물품 데이터: 표시 이름, 그리드 기호, 수출 가치.
 * 가공품 가치는 항상 원재료보다 높다 (철광석 < 철판 < 톱니바퀴, 구리광석 < 구리판 < 회로).
 */

import type { ItemKind } from '../models/types'

export interface ItemSpec {
  name: string
  symbol: string
  exportValue: number
}

export const ITEM_SPECS: Record<ItemKind, ItemSpec> = {
  iron_ore: { name: '철광석', symbol: 'o', exportValue: 1 },
  iron_plate: { name: '철판', symbol: '=', exportValue: 5 },
  gear: { name: '톱니바퀴', symbol: '*', exportValue: 20 },
  copper_ore: { name: '구리광석', symbol: 'c', exportValue: 2 },
  copper_plate: { name: '구리판', symbol: '~', exportValue: 8 },
  circuit: { name: '회로', symbol: '#', exportValue: 50 },
}

export const ITEM_KINDS: readonly ItemKind[] = [
  'iron_ore',
  'iron_plate',
  'gear',
  'copper_ore',
  'copper_plate',
  'circuit',
]

export function exportValue(item: ItemKind): number {
  return ITEM_SPECS[item].exportValue
}

/** 품목별 0으로 채운 카운터 */
export function emptyItemCounts(): Record<ItemKind, number> {
  return {
    iron_ore: 0,
    iron_plate: 0,
    gear: 0,
    copper_ore: 0,
    copper_plate: 0,
    circuit: 0,
  }
}
