export { HabiticaClient, type HabiticaClientOptions } from './api.js';
export { COMMANDS, runCommand, type CommandContext, type CommandHandler } from './commands.js';
export { loadCredentials } from './credentials.js';
export * from './errors.js';
export { feedAll, planFeed, type FeedStep } from './feed.js';
export { hatchAll, planHatch, assessEgg, type HatchStep, type EggAssessment } from './hatch.js';
export { snapshotFromUser, type InventorySnapshot } from './inventory.js';
export { createLogger, type Logger, type LogLevel } from './logger.js';
export { QuestCacheStore, type QuestCache } from './quest-cache.js';
export { resolveQuestSummary } from './quest.js';
export { FixedDelayRateLimiter, type RateLimiter } from './rate-limiter.js';
export { sellPotions, expandPotionKinds, type SellStep } from './sell.js';
export { FEEDING, POTION_KINDS, PRIORITY, type Difficulty } from './stable.js';
export { parseTaskIds, removeAtIndices } from './task-ids.js';
export { TASK_VALUE_BASE, projectHabitValue, qualitativeScore, type Direction } from './task-value.js';
export type { BatchOp, Credentials, HabiticaApi, TaskFields, TaskType } from './types.js';
