export {
  createTypingCoordinator,
  DEFAULT_TYPING_TIMEOUT_MS,
  type TypingCoordinator,
  type TypingCoordinatorOptions,
} from './typing-coordinator.js'
