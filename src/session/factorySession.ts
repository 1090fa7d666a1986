/**
 * 공장 세션 상태 생성·메시지 로그
 * - 설정은 DEFAULT_FACTORY_CONFIG와 병합 후 검증 (잘못된 설정만 예외, 게임 명령은 예외 없음)
 */

import type { Belt, Cell, FactoryConfig, FactoryState, Machine, MachineKind } from '../models/types'
import { DEFAULT_FACTORY_CONFIG, MACHINE_SIZE } from '../models/types'
import { emptyItemCounts } from '../data'

export const WELCOME_MESSAGE = 'Tiny Factory에 오신 것을 환영합니다!'

/** 2 이상이어야 하는 항목 (2×2 기계가 들어갈 최소 크기) */
const GRID_FIELDS = ['gridWidth', 'gridHeight'] as const
/** 1 이상이어야 하는 항목 */
const POSITIVE_FIELDS = ['bufferCapacity', 'logLimit', 'ticksPerSecond'] as const
/** 0 이상이어야 하는 항목 */
const NON_NEGATIVE_FIELDS = ['startingMoney', 'beltCost', 'beltRefund', 'exportFlashTicks'] as const

/** 기본값 병합 + 정수·범위 검사 */
export function resolveFactoryConfig(overrides: Partial<FactoryConfig> = {}): FactoryConfig {
  const config: FactoryConfig = { ...DEFAULT_FACTORY_CONFIG, ...overrides }
  const check = (field: keyof FactoryConfig, min: number) => {
    const value = config[field]
    if (!Number.isInteger(value) || value < min) {
      throw new RangeError(`${field} must be an integer >= ${min} (got ${value})`)
    }
  }
  for (const field of GRID_FIELDS) check(field, MACHINE_SIZE)
  for (const field of POSITIVE_FIELDS) check(field, 1)
  for (const field of NON_NEGATIVE_FIELDS) check(field, 0)
  // 벨트 환급액은 설치비 이하
  if (config.beltRefund > config.beltCost) {
    throw new RangeError(`beltRefund must be <= beltCost (got ${config.beltRefund} > ${config.beltCost})`)
  }
  return config
}

export function createMachine(kind: MachineKind, maxBuffer: number): Machine {
  return {
    kind,
    inputBuffer: [],
    outputBuffer: [],
    progress: 0,
    maxBuffer,
    mode: 'iron',
    stats: { produced: 0, revenue: 0, activeTicks: 0, totalTicks: 0 },
  }
}

export function createBelt(): Belt {
  return { item: null, sourceDirection: null }
}

function createGrid(width: number, height: number): Cell[][] {
  return Array.from({ length: height }, () =>
    Array.from({ length: width }, (): Cell => ({ type: 'empty' }))
  )
}

/** 새 세션: 빈 그리드, 시작 자금, 환영 메시지 1줄 */
export function createFactoryState(overrides: Partial<FactoryConfig> = {}): FactoryState {
  const config = resolveFactoryConfig(overrides)
  return {
    config,
    grid: createGrid(config.gridWidth, config.gridHeight),
    money: config.startingMoney,
    totalExported: 0,
    totalMoneyEarned: 0,
    producedCount: emptyItemCounts(),
    log: [WELCOME_MESSAGE],
    cursor: { x: 0, y: 0 },
    tool: 'none',
    beltDirection: 'right',
    totalTicks: 0,
    animFrame: 0,
    exportFlash: 0,
    lastExportValue: 0,
  }
}

/** 로그 추가. logLimit 초과 시 가장 오래된 줄부터 제거 */
export function addLog(state: FactoryState, text: string): void {
  state.log.push(text)
  if (state.log.length > state.config.logLimit) {
    state.log.splice(0, state.log.length - state.config.logLimit)
  }
}
