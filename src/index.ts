export { loadConfig, type AppConfig } from "./config.js";
export { systemClock, type Clock, type ServiceContext } from "./context.js";
export { openDatabase, type Db } from "./db/connection.js";
export { upsertUserFromAuth, setPrivacyLevel, deactivateUser, type AthleteProfile } from "./db/users.js";
export { startScheduler, scheduleJob, type ScheduledJob, type Scheduler } from "./scheduler.js";
export { ClubService, createService, type ServiceOverrides } from "./service.js";
export { StravaClient, type FetchLike } from "./strava/client.js";
export * from "./types/index.js";
export * from "./utils/errors.js";
export { createLogger, type Logger, type LogLevel } from "./utils/logger.js";
