export { createHindsight, type Hindsight, type HindsightOptions } from './createHindsight.js'
