import { Component, type ErrorInfo, type ReactNode } from 'react'
import './ErrorBoundary.css'

type Props = {
  children: ReactNode
}

type State = {
  error: Error | null
  errorInfo: ErrorInfo | null
}

/** 화면 렌더링 오류 표시. 엔진 명령은 예외를 던지지 않으므로 설정 오류 등만 여기로 옴 */
export class ErrorBoundary extends Component<Props, State> {
  public state: State = { error: null, errorInfo: null }

  public static getDerivedStateFromError(error: Error): State {
    return { error, errorInfo: null }
  }

  public componentDidCatch(error: Error, errorInfo: ErrorInfo) {
    console.error('Uncaught error:', error, errorInfo)
    this.setState({ errorInfo })
  }

  public render() {
    const { error, errorInfo } = this.state
    if (error) {
      return (
        <div className="error-boundary" role="alert">
          <h1>오류가 발생했습니다.</h1>
          <h2 className="error-boundary-message">{error.toString()}</h2>
          <details className="error-boundary-details">
            {errorInfo?.componentStack}
            <br />
            {error.stack}
          </details>
        </div>
      )
    }
    return this.props.children
  }
}
