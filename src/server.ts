import dotenv from 'dotenv'
import pino from 'pino'
import { loadConfig } from './config.js'
import { createApp } from './app.js'
import { createMessageStore } from './storage/index.js'
import { Logger } from './utils/Logger.js'

dotenv.config({ path: process.env.ENV_PATH || '.env' })

const config = loadConfig(process.env)
const logger = pino({ level: config.logLevel })

// One store per process, handed to the app by reference
const store = createMessageStore(
  config.storage,
  new Logger('MessageStore', { level: config.logLevel, logDir: config.logDir })
)

export const app = createApp(store, { pagination: config.pagination, logger })

if (process.env.NODE_ENV !== 'test') {
  app.listen(config.port, config.host, () => {
    logger.info({ backend: config.storage.type }, `Server listening on http://${config.host}:${config.port}`)
  })
}
