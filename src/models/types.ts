/**
 * Tiny Factory 공통 타입 정의
 * 그리드·셀·기계·벨트·세션 상태. 정적 표(비용·레시피·가치)는 data/ 참조.
 */

/** 그리드 셀 위치. x = 열(0=좌측), y = 행(0=상단) */
export interface GridPosition {
  x: number
  y: number
}

/** 벨트·커서 방향. 순서(→↓←↑)는 회전 순서와 동일 */
export type Direction = 'right' | 'down' | 'left' | 'up'

/** 물품 종류 (원자재 → 가공품) */
export type ItemKind =
  | 'iron_ore'
  | 'iron_plate'
  | 'gear'
  | 'copper_ore'
  | 'copper_plate'
  | 'circuit'

/** 기계 종류. 모두 2×2 점유 */
export type MachineKind = 'miner' | 'smelter' | 'assembler' | 'exporter' | 'fabricator'

/** 채굴기 생산 모드 (다른 기계에서는 무시) */
export type MinerMode = 'iron' | 'copper'

/** 기계 누적 통계. 가동률 = activeTicks / totalTicks */
export interface MachineStats {
  /** 생산(수출기는 판매) 누적 개수 */
  produced: number
  /** 수출 수익 누적 */
  revenue: number
  activeTicks: number
  totalTicks: number
}

/** 배치된 기계 한 대. 기준 셀(좌상단)에만 존재 */
export interface Machine {
  kind: MachineKind
  /** 입력 버퍼 (FIFO, 최대 maxBuffer) */
  inputBuffer: ItemKind[]
  /** 출력 버퍼 (FIFO, 최대 maxBuffer) */
  outputBuffer: ItemKind[]
  /** 다음 생산까지 누적 tick */
  progress: number
  maxBuffer: number
  mode: MinerMode
  stats: MachineStats
}

/**
 * 벨트 한 칸.
 * sourceDirection: 현재(또는 마지막) 물품이 들어온 쪽. 물품이 떠나도 유지 → 입력/출력 벨트 판정에 사용.
 */
export interface Belt {
  item: ItemKind | null
  sourceDirection: Direction | null
}

export type Cell =
  | { type: 'empty' }
  | { type: 'machine'; machine: Machine }
  /** 2×2 기계의 나머지 3칸. 실제 데이터는 기준 셀에 */
  | { type: 'machine_part'; anchorX: number; anchorY: number }
  | { type: 'belt'; belt: Belt }

/** 배치 도구 */
export type PlacementTool = 'none' | MachineKind | 'belt' | 'delete'

/** 세션 설정. createFactoryState에서 기본값과 병합 */
export interface FactoryConfig {
  gridWidth: number
  gridHeight: number
  startingMoney: number
  /** 기계 입력·출력 버퍼 최대 개수 */
  bufferCapacity: number
  /** 메시지 로그 최대 줄 수 */
  logLimit: number
  beltCost: number
  beltRefund: number
  /** 수출 시 강조 표시 유지 tick */
  exportFlashTicks: number
  /** 1초당 tick 수 (수입 속도 계산·화면 타이머) */
  ticksPerSecond: number
}

export const DEFAULT_FACTORY_CONFIG: Readonly<FactoryConfig> = {
  gridWidth: 40,
  gridHeight: 30,
  startingMoney: 50,
  bufferCapacity: 5,
  logLimit: 30,
  beltCost: 2,
  beltRefund: 1,
  exportFlashTicks: 5,
  ticksPerSecond: 10,
}

/** 기계 한 변의 칸 수 (2×2) */
export const MACHINE_SIZE = 2

/**
 * 공장 세션 전체 상태 (tick·명령 함수가 직접 변경).
 * grid[y][x]. 기계 부품 셀은 좌표만 가지므로 셀 간 참조 공유 없음.
 */
export interface FactoryState {
  config: FactoryConfig
  grid: Cell[][]
  money: number
  totalExported: number
  totalMoneyEarned: number
  /** 품목별 생산 누적 */
  producedCount: Record<ItemKind, number>
  log: string[]
  cursor: GridPosition
  tool: PlacementTool
  beltDirection: Direction
  /** 시뮬레이션 누적 tick */
  totalTicks: number
  /** 애니메이션 프레임 (2^32에서 순환) */
  animFrame: number
  /** 수출 강조 남은 tick */
  exportFlash: number
  lastExportValue: number
}
