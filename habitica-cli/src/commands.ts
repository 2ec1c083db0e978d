import type { Reporter } from './batch.js';
import { UsageError } from './errors.js';
import { feedAll } from './feed.js';
import { formatHabitList, formatStatus, formatTaskList } from './format.js';
import { hatchAll } from './hatch.js';
import { snapshotFromUser } from './inventory.js';
import type { Logger } from './logger.js';
import { resolveQuestSummary } from './quest.js';
import type { QuestCache } from './quest-cache.js';
import type { RateLimiter } from './rate-limiter.js';
import type { Task } from './schemas.js';
import { sellPotions } from './sell.js';
import { PRIORITY, type Difficulty } from './stable.js';
import { parseTaskIds, removeAtIndices, sortedAscending } from './task-ids.js';
import { projectHabitValue, type Direction } from './task-value.js';
import type { HabiticaApi } from './types.js';

export const HABITICA_TASKS_PAGE = '/#/tasks';

export interface CommandContext {
  api: HabiticaApi;
  out: Reporter;
  logger: Logger;
  limiter: RateLimiter;
  questCache: QuestCache;
  siteUrl: string;
  difficulty: Difficulty;
  openUrl: (url: string) => Promise<void>;
}

export type CommandHandler = (ctx: CommandContext, args: string[]) => Promise<void>;

/** Parses ids before anything is sent, so a typo never leaves a command half-applied. */
function resolveIds(ctx: CommandContext, command: string, tokens: string[]): number[] {
  if (tokens.length === 0) {
    throw new UsageError(`${command} needs at least one task id`);
  }
  ctx.logger.debug('raw task ids', { tokens });
  return sortedAscending(parseTaskIds(tokens));
}

function inRange(ctx: CommandContext, kind: string, list: readonly Task[], index: number): boolean {
  if (index < list.length) return true;
  ctx.out(`No ${kind} with id ${index + 1}`);
  return false;
}

const habits: CommandHandler = async (ctx, args) => {
  const [action, ...rest] = args;
  if (action !== undefined && action !== 'up' && action !== 'down') {
    throw new UsageError(`Unknown habits action: ${action}`);
  }
  const indices = action ? resolveIds(ctx, `habits ${action}`, rest) : [];

  let list = await ctx.api.listTasks('habits');
  if (action === 'up' || action === 'down') {
    const direction: Direction = action;
    for (const index of indices) {
      if (!inRange(ctx, 'habit', list, index)) continue;
      const habit = list[index];
      await ctx.limiter.acquire();
      await ctx.api.postTaskDirection(habit.id, direction);
      ctx.out(`${direction === 'up' ? 'incremented' : 'decremented'} task '${habit.text}'`);
      const value = projectHabitValue(habit.value, direction);
      list = list.map((task, i) => (i === index ? { ...task, value } : task));
    }
  }
  formatHabitList(list).forEach((line) => ctx.out(line));
};

const dailies: CommandHandler = async (ctx, args) => {
  const [action, ...rest] = args;
  if (action !== undefined && action !== 'done' && action !== 'undo') {
    throw new UsageError(`Unknown dailies action: ${action}`);
  }
  const indices = action ? resolveIds(ctx, `dailies ${action}`, rest) : [];

  let list = await ctx.api.listTasks('dailys');
  for (const index of indices) {
    if (!inRange(ctx, 'daily', list, index)) continue;
    const daily = list[index];
    await ctx.limiter.acquire();
    if (action === 'done') {
      await ctx.api.postTaskDirection(daily.id, 'up');
      ctx.out(`marked daily '${daily.text}' completed`);
    } else {
      await ctx.api.putTask(daily.id, { completed: false });
      ctx.out(`marked daily '${daily.text}' incomplete`);
    }
    const completed = action === 'done';
    list = list.map((task, i) => (i === index ? { ...task, completed } : task));
  }
  formatTaskList(list).forEach((line) => ctx.out(line));
};

const todos: CommandHandler = async (ctx, args) => {
  const [action, ...rest] = args;
  if (action !== undefined && action !== 'done' && action !== 'add') {
    throw new UsageError(`Unknown todos action: ${action}`);
  }
  const indices = action === 'done' ? resolveIds(ctx, 'todos done', rest) : [];
  const text = action === 'add' ? rest.join(' ').trim() : '';
  if (action === 'add' && !text) {
    throw new UsageError('todos add needs a description');
  }

  let list = (await ctx.api.listTasks('todos')).filter((task) => !task.completed);
  if (action === 'done') {
    const completed = new Set<number>();
    for (const index of indices) {
      if (!inRange(ctx, 'todo', list, index)) continue;
      const todo = list[index];
      await ctx.limiter.acquire();
      await ctx.api.postTaskDirection(todo.id, 'up');
      ctx.out(`marked todo '${todo.text}' complete`);
      completed.add(index);
    }
    list = removeAtIndices(list, completed);
  } else if (action === 'add') {
    const created = await ctx.api.postTask({ type: 'todo', text, priority: PRIORITY[ctx.difficulty] });
    list = [created, ...list];
    ctx.out(`added new todo '${text}'`);
  }
  formatTaskList(list).forEach((line) => ctx.out(line));
};

const status: CommandHandler = async (ctx) => {
  const user = await ctx.api.getUser();
  const party = await ctx.api.getPartyStatus();
  const quest = await resolveQuestSummary(ctx.api, party, ctx.questCache, ctx.logger);
  formatStatus(user, quest).forEach((line) => ctx.out(line));
};

const server: CommandHandler = async (ctx) => {
  const result = await ctx.api.getServerStatus();
  if (result.status === 'up') {
    ctx.out('Habitica server is up');
  } else {
    ctx.out('Habitica server down... or your computer cannot connect');
  }
};

const home: CommandHandler = async (ctx) => {
  const url = `${ctx.siteUrl}${HABITICA_TASKS_PAGE}`;
  ctx.out(`Opening ${url}`);
  await ctx.openUrl(url);
};

function isCountRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const item: CommandHandler = async (ctx, args) => {
  const user = await ctx.api.getUser();
  const items: Record<string, unknown> = user.items;
  const [type] = args;
  if (type === undefined) {
    Object.keys(items).forEach((name) => ctx.out(name));
    return;
  }
  const group = Object.prototype.hasOwnProperty.call(items, type) ? items[type] : undefined;
  if (!isCountRecord(group)) {
    ctx.out(`No items of type ${type}`);
    return;
  }
  for (const [name, count] of Object.entries(group)) {
    // owned mounts are reported as `true`
    const held = count === true ? 1 : count;
    if (typeof held === 'number' && held > 0) {
      ctx.out(`${held} ${name}`);
    }
  }
};

const feed: CommandHandler = async (ctx) => {
  const user = await ctx.api.getUser();
  await feedAll(ctx.api, snapshotFromUser(user), ctx.out);
};

const hatch: CommandHandler = async (ctx) => {
  const user = await ctx.api.getUser();
  await hatchAll(ctx.api, snapshotFromUser(user), ctx.out);
};

const sell: CommandHandler = async (ctx, args) => {
  if (args.length === 0) {
    throw new UsageError('sell needs a potion kind or "all"');
  }
  const user = await ctx.api.getUser();
  await sellPotions(ctx.api, snapshotFromUser(user), args, ctx.out);
};

export const COMMANDS: Readonly<Record<string, CommandHandler>> = Object.freeze({
  status,
  habits,
  dailies,
  todos,
  server,
  home,
  item,
  feed,
  hatch,
  sell,
});

export async function runCommand(ctx: CommandContext, command: string, args: string[]): Promise<void> {
  if (!Object.prototype.hasOwnProperty.call(COMMANDS, command)) {
    throw new UsageError(`Unknown command: ${command}`);
  }
  ctx.logger.debug('running command', { command, args });
  await COMMANDS[command](ctx, args);
}
