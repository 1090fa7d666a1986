/**
 * 그리드 화면 표시용 셀 목록 (순수 함수)
 * 기계는 기준 셀 하나가 2×2를 차지하고 부품 칸은 목록에서 제외 (배치 화면의 셀 병합과 동일).
 */

import type { FactoryState } from '../../models/types'
import { MACHINE_SIZE } from '../../models/types'
import { ITEM_SPECS, MACHINE_SPECS } from '../../data'
import { directionArrow, oppositeDirection } from '../layout/gridUtils'
import { computeIoHints, isOutputBlocked } from './factoryStats'

export interface CellView {
  key: string
  x: number
  y: number
  span: number
  label: string
  className: string
  title: string
}

const cellKey = (x: number, y: number) => `${x},${y}`

/** 진행률 표시 (0~9) */
function progressDigit(progress: number, recipeTime: number): string {
  return String(Math.min(9, Math.floor((progress / recipeTime) * 10)))
}

export function buildGridView(state: FactoryState): CellView[] {
  const hints = new Map(computeIoHints(state).map((h) => [cellKey(h.x, h.y), h.role]))
  const views: CellView[] = []
  state.grid.forEach((row, y) => {
    row.forEach((cell, x) => {
      const key = cellKey(x, y)
      const cursor = state.cursor.x === x && state.cursor.y === y ? ' factory-cell--cursor' : ''
      if (cell.type === 'machine_part') return
      if (cell.type === 'machine') {
        const m = cell.machine
        const spec = MACHINE_SPECS[m.kind]
        const blocked = isOutputBlocked(state, { x, y }) ? ' factory-cell--blocked' : ''
        const flash = m.kind === 'exporter' && state.exportFlash > 0 ? ' factory-cell--flash' : ''
        const mode = m.kind === 'miner' ? ` factory-cell--${m.mode}` : ''
        views.push({
          key,
          x,
          y,
          span: MACHINE_SIZE,
          label: `${spec.symbol}${progressDigit(m.progress, spec.recipeTime)}`,
          className: `factory-cell factory-cell--machine factory-cell--${m.kind}${mode}${blocked}${flash}${cursor}`,
          title: `${spec.name} 입력 ${m.inputBuffer.length}/${m.maxBuffer} 출력 ${m.outputBuffer.length}/${m.maxBuffer}`,
        })
        return
      }
      if (cell.type === 'belt') {
        const { item, sourceDirection } = cell.belt
        const arrow = sourceDirection ? directionArrow(oppositeDirection(sourceDirection)) : '·'
        views.push({
          key,
          x,
          y,
          span: 1,
          label: item ? ITEM_SPECS[item].symbol : arrow,
          className: `factory-cell factory-cell--belt${item ? ' factory-cell--loaded' : ''}${cursor}`,
          title: item ? `벨트: ${ITEM_SPECS[item].name}` : '벨트',
        })
        return
      }
      const hint = hints.get(key)
      views.push({
        key,
        x,
        y,
        span: 1,
        label: '',
        className: `factory-cell${hint ? ` factory-cell--hint-${hint}` : ''}${cursor}`,
        title: '',
      })
    })
  })
  return views
}
