import { useState, useRef, useEffect, useCallback } from 'react'
import type { FactoryConfig, PlacementTool } from '../../models/types'
import { ITEM_KINDS, ITEM_SPECS, MACHINE_KINDS, MACHINE_SPECS } from '../../data'
import { createFactoryState } from '../../session'
import { directionArrow } from '../layout/gridUtils'
import { place, rotateBelt, selectTool, setCursor, toggleMinerMode } from '../layout/placement'
import { tick } from './simulationEngine'
import { buildGridView } from './cellView'
import { collectKindStats, incomePerSecond } from './factoryStats'
import './FactoryMode.css'

type ToolButton = { tool: PlacementTool; label: string }

/** 도구 막대: 선택 + 기계 5종 + 벨트 + 철거 */
function toolButtons(config: FactoryConfig): ToolButton[] {
  return [
    { tool: 'none', label: '선택' },
    ...MACHINE_KINDS.map((kind) => ({
      tool: kind,
      label: `${MACHINE_SPECS[kind].name} ($${MACHINE_SPECS[kind].cost})`,
    })),
    { tool: 'belt', label: `벨트 ($${config.beltCost})` },
    { tool: 'delete', label: '철거' },
  ]
}

type Props = {
  config?: Partial<FactoryConfig>
}

/**
 * 공장 화면
 * - 세션 상태는 엔진 함수가 직접 변경 → version 증가로 다시 그림
 * - 재생 중에는 ticksPerSecond 간격으로 1 tick씩 진행
 */
export function FactoryMode({ config }: Props) {
  const [state] = useState(() => createFactoryState(config))
  const [, setVersion] = useState(0)
  const [isRunning, setIsRunning] = useState(false)
  const intervalRef = useRef<ReturnType<typeof setInterval> | null>(null)

  const refresh = useCallback(() => setVersion((v) => v + 1), [])

  useEffect(() => {
    if (!isRunning) return
    intervalRef.current = setInterval(() => {
      tick(state, 1)
      refresh()
    }, 1000 / state.config.ticksPerSecond)
    return () => {
      if (intervalRef.current) clearInterval(intervalRef.current)
      intervalRef.current = null
    }
  }, [isRunning, state, refresh])

  const handleStep = () => {
    tick(state, 1)
    refresh()
  }

  const handleSelectTool = (tool: PlacementTool) => {
    selectTool(state, tool)
    refresh()
  }

  const handleCellClick = (x: number, y: number) => {
    setCursor(state, x, y)
    place(state)
    refresh()
  }

  const handleRotate = () => {
    rotateBelt(state)
    refresh()
  }

  const handleToggleMode = () => {
    toggleMinerMode(state)
    refresh()
  }

  const { gridWidth, gridHeight } = state.config
  const cells = buildGridView(state)
  const kindStats = collectKindStats(state)
  const income = incomePerSecond(state)
  const flash = state.exportFlash > 0 ? ` (+$${state.lastExportValue})` : ''

  return (
    <div className="factory-mode">
      <header className="factory-top">
        <section className="factory-summary">
          <span className="factory-money">{`$${state.money}${flash}`}</span>
          <span className="factory-exported">{`수출 ${state.totalExported}개`}</span>
          <span className="factory-income">{`수입 $${income.toFixed(1)}/s`}</span>
          <span className="factory-tick">{`Tick: ${state.totalTicks}`}</span>
        </section>
        <section className="factory-controls">
          <button
            type="button"
            className="factory-btn factory-btn--play"
            onClick={() => setIsRunning((v) => !v)}
          >
            {isRunning ? '일시정지' : '재생'}
          </button>
          <button type="button" className="factory-btn" onClick={handleStep} disabled={isRunning}>
            1 tick
          </button>
          <button type="button" className="factory-btn" onClick={handleRotate}>
            {`벨트 방향 ${directionArrow(state.beltDirection)}`}
          </button>
          <button type="button" className="factory-btn" onClick={handleToggleMode}>
            채굴기 철/구리
          </button>
        </section>
      </header>

      <nav className="factory-tools">
        {toolButtons(state.config).map(({ tool, label }) => (
          <button
            key={tool}
            type="button"
            className={`factory-tool${state.tool === tool ? ' active' : ''}`}
            onClick={() => handleSelectTool(tool)}
          >
            {label}
          </button>
        ))}
      </nav>

      <div className="factory-main">
        <section
          className="factory-grid"
          style={{
            gridTemplateRows: `repeat(${gridHeight}, 1fr)`,
            gridTemplateColumns: `repeat(${gridWidth}, 1fr)`,
            aspectRatio: `${gridWidth} / ${gridHeight}`,
          }}
        >
          {cells.map((cell) => (
            <button
              key={cell.key}
              type="button"
              className={cell.className}
              title={cell.title}
              style={{
                gridRow: `${cell.y + 1} / span ${cell.span}`,
                gridColumn: `${cell.x + 1} / span ${cell.span}`,
              }}
              onClick={() => handleCellClick(cell.x, cell.y)}
            >
              {cell.label}
            </button>
          ))}
        </section>

        <aside className="factory-side">
          <table className="factory-stats">
            <thead>
              <tr>
                <th>기계</th>
                <th>대수</th>
                <th>생산</th>
                <th>가동률</th>
              </tr>
            </thead>
            <tbody>
              {MACHINE_KINDS.map((kind) => {
                const s = kindStats[kind]
                return (
                  <tr key={kind}>
                    <td>{MACHINE_SPECS[kind].name}</td>
                    <td>{s.count}</td>
                    <td>{s.produced}</td>
                    <td>{`${Math.round(s.avgUtilization * 100)}%`}</td>
                  </tr>
                )
              })}
            </tbody>
          </table>
          <ul className="factory-produced">
            {ITEM_KINDS.map((item) => (
              <li key={item}>{`${ITEM_SPECS[item].symbol} ${ITEM_SPECS[item].name}: ${state.producedCount[item]}`}</li>
            ))}
          </ul>
          <ol className="factory-log">
            {[...state.log].reverse().map((line, i) => (
              <li key={`${state.log.length - i}-${line}`}>{line}</li>
            ))}
          </ol>
        </aside>
      </div>
    </div>
  )
}
