export { createServer, type AppServer, type ServerOptions } from "./server";
export {
  createServices,
  type Services,
  type ServiceOverrides,
} from "./services";
export { loadConfig, loadEnvFile, type AppConfig } from "./config";
export { startServer, type StartOptions } from "./start";
export { NotificationOutbox, type NotificationOutboxOptions } from "./outbox";
export { renderPage } from "./routes/callback";
export { AppError, ValidationError, ConfigError } from "./errors";
