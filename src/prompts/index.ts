export {
  buildLearningExtractionPrompt,
  buildExtractionSystemPrompt,
  LEARNING_OUTPUT_SCHEMA,
} from './learningPrompts.js'
