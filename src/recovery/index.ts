export { setupGracefulShutdown, type ShutdownHandlerOptions } from './shutdown-handler.js'
