import type { SemgramOptions } from './src/types.js'
import { defineConfig } from './src/config.js'

const config: SemgramOptions = defineConfig({
  // Output options (these match the defaults)
  json: false,
  colors: true,
  verbose: false,

  // Print the input with a caret under the failing offset
  showSource: true,
})

export default config
