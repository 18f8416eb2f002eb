export type Log = (message: string) => void

export function createLogger(scope: string): Log {
  return (message: string) => {
    const timestamp = new Date().toISOString().split('T')[1].split('.')[0]
    console.log(`[${timestamp}] [${scope}] ${message}`)
  }
}

export const silentLog: Log = () => {}
