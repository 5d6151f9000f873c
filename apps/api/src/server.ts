import 'dotenv/config'
import { serve } from '@hono/node-server'
import { checkDatabaseConnection, createDatabase } from '@pushrelay/db'
import { createApp } from './app.js'
import { ConfigError, loadConfig } from './config.js'
import { createFirebaseGateway } from './gateway/firebase-gateway.js'
import { createLogger } from './logger.js'
import { createServices } from './services/index.js'
import { PgNotificationStore } from './storage/pg-store.js'

async function main() {
  const config = loadConfig()
  const logger = createLogger(config.logLevel)

  const { db, pool } = createDatabase(config.databaseUrl)
  await checkDatabaseConnection(pool)

  const services = createServices(
    {
      store: new PgNotificationStore(db),
      gateway: createFirebaseGateway({
        projectId: config.firebaseProjectId,
        serviceAccountJson: config.firebaseAuth,
      }),
      logger,
    },
    { fanoutConcurrency: config.fanoutConcurrency },
  )

  const app = createApp({
    services,
    logger,
    settings: {
      jwtSecret: config.jwtSecret,
      internalApiKey: config.internalApiKey,
      adminGroup: config.adminGroup,
      version: config.version,
    },
  })

  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    logger.info({ port: info.port, env: config.env, version: config.version }, 'server_started')
  })

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'server_stopping')
    server.close(() => {
      pool.end().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, 'database_close_failed')
          process.exit(1)
        },
      )
    })
  }
  process.once('SIGTERM', shutdown)
  process.once('SIGINT', shutdown)
}

main().catch((error: unknown) => {
  const logger = createLogger()
  if (error instanceof ConfigError) {
    logger.fatal({ keys: error.keys }, error.message)
  } else {
    logger.fatal({ err: error }, 'server_start_failed')
  }
  process.exit(1)
})
