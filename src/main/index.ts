// src/main/index.ts
import 'dotenv/config'
import { AssistantApp } from './app'
import { HotkeyParseError } from './core/input/hotkey'
import { UnsupportedPlatformError } from './core/input/platform'
import { ConfigError, settingsManager } from './core/settings/settings-manager'
import { TerminalSurface } from './terminal/terminal-surface'
import { createLogger, setLogLevel } from './utils/logger'

const logger = createLogger('Main')

// Global error handlers
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception:', error)
})

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection:', reason)
})

async function main(): Promise<void> {
  const config = settingsManager.resolve()
  setLogLevel(config.logLevel)

  let app: AssistantApp | null = null
  let exiting = false
  const exit = () => {
    if (exiting) return
    exiting = true
    const pending = app ? app.shutdown() : Promise.resolve()
    pending
      .catch(error => logger.error('Error during shutdown:', error))
      .finally(() => {
        surface.stop()
        process.exit(0)
      })
  }

  const surface = new TerminalSurface({ hotkey: config.hotkey, onExit: exit })
  app = new AssistantApp({ config, host: surface })

  await app.start()
  surface.start()

  process.on('SIGINT', exit)
  process.on('SIGTERM', exit)
}

main().catch(error => {
  if (error instanceof ConfigError || error instanceof HotkeyParseError || error instanceof UnsupportedPlatformError) {
    logger.error(error.message)
  } else {
    logger.error('Failed to start:', error)
  }
  process.exit(1)
})
