import type { QuestCache } from './quest-cache.js';
import type { RateLimiter } from './rate-limiter.js';
import { UserSchema, type Content, type Party, type ServerStatus, type Task, type User } from './schemas.js';
import type { Direction } from './task-value.js';
import type { BatchOp, BatchOpName, HabiticaApi, QuestCacheRecord, TaskFields, TaskType } from './types.js';

export interface ItemsInput {
  food?: Record<string, number>;
  pets?: Record<string, number>;
  mounts?: Record<string, boolean | number>;
  eggs?: Record<string, number>;
  hatchingPotions?: Record<string, number>;
  currentPet?: string;
  currentMount?: string;
}

export const DEFAULT_STATS = {
  lvl: 1,
  class: 'warrior',
  hp: 50,
  maxHealth: 50,
  exp: 0,
  toNextLevel: 25,
  mp: 10,
  maxMP: 10,
  gp: 0,
};

export function makeUser(items: ItemsInput = {}, overrides: { stats?: Partial<typeof DEFAULT_STATS>; balance?: number } = {}): User {
  return UserSchema.parse({
    stats: { ...DEFAULT_STATS, ...overrides.stats },
    items,
    balance: overrides.balance,
  });
}

export function makeTask(id: string, text: string, fields: Partial<Task> = {}): Task {
  return { id, text, completed: false, value: 0, priority: 1, ...fields };
}

export type FakeCall =
  | { method: 'getUser' | 'getServerStatus' | 'getPartyStatus' | 'getContent' }
  | { method: 'listTasks'; type: TaskType }
  | { method: 'postTaskDirection'; id: string; direction: Direction }
  | { method: 'putTask'; id: string; fields: TaskFields }
  | { method: 'postTask'; fields: TaskFields }
  | { method: 'postBatchOps'; ops: BatchOp[] };

export interface FakeHabiticaOptions {
  user?: User;
  tasks?: Partial<Record<TaskType, Task[]>>;
  party?: Party | null;
  content?: Content;
  serverStatus?: string;
  /** Ops the fake accepts but does not apply, to simulate a server that ignored them. */
  ignoredOps?: BatchOpName[];
}

/** In-process stand-in for the Habitica API that applies batch ops to its own user state. */
export class FakeHabitica implements HabiticaApi {
  user: User;
  tasks: Record<TaskType, Task[]>;
  party: Party | null;
  content: Content;
  serverStatus: string;
  readonly calls: FakeCall[] = [];
  private readonly ignoredOps: Set<BatchOpName>;
  private nextId = 1;

  constructor(options: FakeHabiticaOptions = {}) {
    this.user = options.user ?? makeUser();
    this.tasks = { habits: [], dailys: [], todos: [], ...options.tasks };
    this.party = options.party ?? null;
    this.content = options.content ?? { quests: {} };
    this.serverStatus = options.serverStatus ?? 'up';
    this.ignoredOps = new Set(options.ignoredOps ?? []);
  }

  get batches(): BatchOp[][] {
    const result: BatchOp[][] = [];
    for (const call of this.calls) {
      if (call.method === 'postBatchOps') result.push(call.ops);
    }
    return result;
  }

  async getUser(): Promise<User> {
    this.calls.push({ method: 'getUser' });
    return structuredClone(this.user);
  }

  async getServerStatus(): Promise<ServerStatus> {
    this.calls.push({ method: 'getServerStatus' });
    return { status: this.serverStatus };
  }

  async getPartyStatus(): Promise<Party | null> {
    this.calls.push({ method: 'getPartyStatus' });
    return structuredClone(this.party);
  }

  async getContent(): Promise<Content> {
    this.calls.push({ method: 'getContent' });
    return structuredClone(this.content);
  }

  async listTasks(type: TaskType): Promise<Task[]> {
    this.calls.push({ method: 'listTasks', type });
    return structuredClone(this.tasks[type]);
  }

  async postTaskDirection(id: string, direction: Direction): Promise<void> {
    this.calls.push({ method: 'postTaskDirection', id, direction });
  }

  async putTask(id: string, fields: TaskFields): Promise<Task> {
    this.calls.push({ method: 'putTask', id, fields });
    for (const type of ['habits', 'dailys', 'todos'] as const) {
      const task = this.tasks[type].find((entry) => entry.id === id);
      if (task) return { ...task, ...fields };
    }
    throw new Error(`no task ${id}`);
  }

  async postTask(fields: TaskFields): Promise<Task> {
    this.calls.push({ method: 'postTask', fields });
    const id = `new-${this.nextId}`;
    this.nextId += 1;
    return makeTask(id, fields.text ?? '', { priority: fields.priority ?? 1 });
  }

  async postBatchOps(_resource: 'user', ops: BatchOp[]): Promise<User> {
    this.calls.push({ method: 'postBatchOps', ops: structuredClone(ops) });
    for (const op of ops) {
      if (!this.ignoredOps.has(op.op)) this.apply(op);
    }
    return structuredClone(this.user);
  }

  private apply(op: BatchOp) {
    const { items } = this.user;
    if (op.op === 'feed') {
      items.food[op.params.food] = (items.food[op.params.food] ?? 0) - 1;
      items.pets[op.params.pet] = (items.pets[op.params.pet] ?? 0) + 1;
    } else if (op.op === 'hatch') {
      const { egg, hatchingPotion } = op.params;
      items.eggs[egg] = (items.eggs[egg] ?? 0) - 1;
      items.hatchingPotions[hatchingPotion] = (items.hatchingPotions[hatchingPotion] ?? 0) - 1;
      items.pets[`${egg}-${hatchingPotion}`] = 5;
    } else if (op.params.type === 'eggs') {
      items.eggs[op.params.key] = (items.eggs[op.params.key] ?? 0) - 1;
    } else if (op.params.type === 'hatchingPotions') {
      items.hatchingPotions[op.params.key] = (items.hatchingPotions[op.params.key] ?? 0) - 1;
    }
  }
}

export class MemoryQuestCache implements QuestCache {
  record: QuestCacheRecord = {
    questKey: '',
    questType: '',
    questMax: '',
    questTitle: '',
  };

  read(): QuestCacheRecord {
    return { ...this.record };
  }

  update(fields: Partial<QuestCacheRecord>): QuestCacheRecord {
    this.record = { ...this.record, ...fields };
    return this.read();
  }
}

export class CountingLimiter implements RateLimiter {
  acquired = 0;

  async acquire(): Promise<void> {
    this.acquired += 1;
  }
}
