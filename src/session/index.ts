export {
  WELCOME_MESSAGE,
  resolveFactoryConfig,
  createFactoryState,
  createMachine,
  createBelt,
  addLog,
} from './factorySession'
