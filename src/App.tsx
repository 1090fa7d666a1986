import { ErrorBoundary } from './components/ErrorBoundary'
import { FactoryMode } from './features/simulation/FactoryMode'
import { readEnvConfig } from './config'
import './App.css'

const envConfig = readEnvConfig(import.meta.env)

/**
 * 앱 전체 레이아웃
 * - 헤더: 타이틀
 * - 본문: 공장 화면 (오류 경계로 감쌈)
 */
function App() {
  return (
    <div className="app">
      <header className="app-header">
        <h1 className="app-title">Tiny Factory</h1>
      </header>
      <main className="app-main">
        <ErrorBoundary>
          <FactoryMode config={envConfig} />
        </ErrorBoundary>
      </main>
    </div>
  )
}

export default App
