import 'dotenv/config'
import { createApp } from './app.js'
import { loadServiceConfig, type ServiceConfig } from './config.js'
import { createDocumentAiClient } from './services/documentAiClient.js'

let config: ServiceConfig
try {
  config = loadServiceConfig()
} catch (error) {
  console.error('[resume-api] MISTRAL_API_KEY is required', error instanceof Error ? error.message : error)
  process.exit(1)
}

const client = createDocumentAiClient({
  baseUrl: config.baseUrl,
  apiKey: config.apiKey,
  ocrModel: config.ocrModel,
  chatModel: config.chatModel
})

const app = createApp({ client, config })

app.listen(config.port, () => {
  console.log(`Resume parser API listening on :${config.port}`)
})
