import type { Content, Party, ServerStatus, Task, User } from './schemas.js';
import type { Direction } from './task-value.js';

export type TaskType = 'habits' | 'dailys' | 'todos';

export type BatchOpName = 'feed' | 'hatch' | 'sell';

export interface BatchOp {
  op: BatchOpName;
  params: Record<string, string>;
}

export interface TaskFields {
  type?: 'habit' | 'daily' | 'todo';
  text?: string;
  completed?: boolean;
  priority?: number;
}

export interface Credentials {
  url: string;
  userId: string;
  apiKey: string;
}

/** Everything the commands need from the Habitica API. */
export interface HabiticaApi {
  getUser(): Promise<User>;
  getServerStatus(): Promise<ServerStatus>;
  getPartyStatus(): Promise<Party | null>;
  getContent(): Promise<Content>;
  listTasks(type: TaskType): Promise<Task[]>;
  postTaskDirection(id: string, direction: Direction): Promise<void>;
  putTask(id: string, fields: TaskFields): Promise<Task>;
  postTask(fields: TaskFields): Promise<Task>;
  postBatchOps(resource: 'user', ops: BatchOp[]): Promise<User>;
}

export type BatchApi = Pick<HabiticaApi, 'postBatchOps'>;

export interface QuestCacheRecord {
  questKey: string;
  questType: '' | 'collect' | 'hp';
  questMax: string;
  questTitle: string;
}
