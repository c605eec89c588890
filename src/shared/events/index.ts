export {
  LearningEventBus,
  learningEventBus,
  type LearningEventMap,
  type MemoryCreatedPayload,
  type MemoryOutcomePayload,
  type MaintenanceCompletedPayload,
} from './learningEvents.js'
