/**
 * Vite 환경변수 → 세션 설정 (값이 있을 때만 덮어씀)
 * VITE_TICKS_PER_SECOND, VITE_STARTING_MONEY, VITE_GRID_WIDTH, VITE_GRID_HEIGHT
 */

import type { FactoryConfig } from './models/types'

type EnvSource = Record<string, string | boolean | undefined>

const ENV_FIELDS: { env: string; field: keyof FactoryConfig }[] = [
  { env: 'VITE_TICKS_PER_SECOND', field: 'ticksPerSecond' },
  { env: 'VITE_STARTING_MONEY', field: 'startingMoney' },
  { env: 'VITE_GRID_WIDTH', field: 'gridWidth' },
  { env: 'VITE_GRID_HEIGHT', field: 'gridHeight' },
]

export function readEnvConfig(env: EnvSource): Partial<FactoryConfig> {
  const config: Partial<FactoryConfig> = {}
  for (const { env: name, field } of ENV_FIELDS) {
    const raw = env[name]
    if (typeof raw !== 'string' || raw.trim() === '') continue
    const value = Number(raw)
    // 범위 검사는 createFactoryState에서
    if (Number.isFinite(value)) config[field] = value
  }
  return config
}
