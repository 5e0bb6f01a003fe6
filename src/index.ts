import { realpathSync } from 'fs'
import { pathToFileURL } from 'url'
import { main as cliMain } from './cli/index.js'

export { main, VERSION } from './cli/index.js'

// Re-export core modules for programmatic use
export * from './sandbox/index.js'
export * from './platform/index.js'
export * from './protocol/index.js'
export * from './stream/index.js'
export * from './audit/index.js'
export * from './config/index.js'
export * from './gateway/index.js'

// Run CLI if executed directly (bin links resolve to this file)
const entry = process.argv[1]
if (entry && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  cliMain().catch((error) => {
    console.error('Fatal error:', error)
    process.exit(1)
  })
}
