#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'

import { errorMessage } from '../core/errors.js'
import { logger as rootLogger, setLoggerMuted, withFields } from '../core/logger.js'
import { loadSampleServerConfig } from './config.js'
import { createSampleServer } from './sample-server.js'

const logger = withFields(rootLogger, { component: 'sample-server' })

try {
  setLoggerMuted(process.env.SAMPLE_LOG_MUTED === 'true')
  const config = loadSampleServerConfig()
  const server = createSampleServer({ ...config, logger })
  await server.connect(new StdioServerTransport())
  logger.info('sample.started', { apiBaseUrl: config.apiBaseUrl, generateText: Boolean(config.model) })
} catch (error) {
  logger.error('sample.failed', { error: errorMessage(error) })
  process.exitCode = 1
}
