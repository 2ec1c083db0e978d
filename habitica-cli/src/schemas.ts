import { z } from 'zod';
import { UnexpectedShapeError } from './errors.js';

export const EnvelopeSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z.string().optional(),
  message: z.string().optional(),
});

export const TaskSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  type: z.string().optional(),
  completed: z.boolean().optional().default(false),
  value: z.number().optional().default(0),
  priority: z.number().optional().default(1),
});

export const TaskListSchema = z.array(TaskSchema);

const CountMapSchema = z.record(z.string(), z.number());

export const ItemsSchema = z
  .object({
    food: CountMapSchema.default({}),
    pets: z.record(z.string(), z.number().nullable()).default({}),
    mounts: z.record(z.string(), z.union([z.boolean(), z.number()]).nullable()).default({}),
    eggs: CountMapSchema.default({}),
    hatchingPotions: CountMapSchema.default({}),
    currentPet: z.string().optional(),
    currentMount: z.string().optional(),
  })
  .passthrough();

export const StatsSchema = z.object({
  lvl: z.number(),
  class: z.string(),
  hp: z.number(),
  maxHealth: z.number(),
  exp: z.number(),
  toNextLevel: z.number(),
  mp: z.number(),
  maxMP: z.number(),
  gp: z.number().optional().default(0),
});

export const UserSchema = z.object({
  stats: StatsSchema,
  items: ItemsSchema,
  balance: z.number().optional(),
});

export const ServerStatusSchema = z.object({
  status: z.string(),
});

const CollectProgressSchema = z.union([z.number(), z.object({ count: z.number() })]);

export const PartySchema = z.object({
  quest: z
    .object({
      key: z.string().nullish(),
      active: z.boolean().optional(),
      progress: z
        .object({
          hp: z.number().optional(),
          collect: z.record(z.string(), CollectProgressSchema).optional(),
        })
        .optional(),
    })
    .optional(),
});

// /content is large; only the quest table is kept and each quest is checked when it is used.
export const ContentSchema = z.object({
  quests: z.record(z.string(), z.unknown()),
});

export const QuestContentSchema = z.object({
  text: z.string(),
  collect: z.record(z.string(), z.object({ count: z.number(), text: z.string().optional() })).optional(),
  boss: z.object({ hp: z.number() }).optional(),
});

export type Task = z.infer<typeof TaskSchema>;
export type Items = z.infer<typeof ItemsSchema>;
export type Stats = z.infer<typeof StatsSchema>;
export type User = z.infer<typeof UserSchema>;
export type ServerStatus = z.infer<typeof ServerStatusSchema>;
export type Party = z.infer<typeof PartySchema>;
export type Content = z.infer<typeof ContentSchema>;
export type QuestContent = z.infer<typeof QuestContentSchema>;

export function parseShape<T extends z.ZodTypeAny>(schema: T, value: unknown, where: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const suffix = issue && issue.path.length > 0 ? `.${issue.path.join('.')}` : '';
    throw new UnexpectedShapeError(`${where}${suffix}`, issue?.message);
  }
  return result.data;
}
