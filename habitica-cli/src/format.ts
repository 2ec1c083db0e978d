import type { Task, User } from './schemas.js';
import { qualitativeScore } from './task-value.js';

const STATUS_LABELS = ['health', 'xp', 'mana', 'currency', 'quest', 'pet', 'mount'];

export function formatTaskList(tasks: readonly Pick<Task, 'completed' | 'text'>[]): string[] {
  return tasks.map((task, i) => `[${task.completed ? 'x' : ' '}] ${i + 1} ${task.text}`);
}

export function formatHabitList(habits: readonly Pick<Task, 'value' | 'text'>[]): string[] {
  return habits.map((habit, i) => `[${qualitativeScore(habit.value)}] ${i + 1} ${habit.text}`);
}

function capitalize(value: string): string {
  return value ? value[0].toUpperCase() + value.slice(1).toLowerCase() : value;
}

export interface Currency {
  gold: number;
  silver: number;
  gems: number;
}

export function splitCurrency(gp: number, balance: number): Currency {
  const gold = Math.trunc(gp);
  return {
    gold,
    silver: Math.trunc((gp - gold) * 100),
    // balance is stored in dollars, one dollar buys four gems
    gems: Math.trunc(balance * 4),
  };
}

export function formatStatus(user: User, quest: string): string[] {
  const { stats, items } = user;
  const title = `Level ${Math.trunc(stats.lvl)} ${capitalize(stats.class)}`;
  const foodCount = Object.values(items.food).reduce((sum, count) => sum + count, 0);
  const { gold, silver, gems } = splitCurrency(stats.gp, user.balance ?? 0);

  const width = Math.max(...STATUS_LABELS.map((label) => label.length)) + 1;
  const row = (label: string, value: string) => `${`${label}:`.padStart(width, ' ')} ${value}`;
  const rule = '-'.repeat(title.length);

  return [
    rule,
    title,
    rule,
    row('Health', `${Math.trunc(stats.hp)}/${Math.trunc(stats.maxHealth)}`),
    row('XP', `${Math.trunc(stats.exp)}/${Math.trunc(stats.toNextLevel)}`),
    row('Mana', `${Math.trunc(stats.mp)}/${Math.trunc(stats.maxMP)}`),
    row('Currency', `Gold: ${gold}  Silver: ${silver}  Gems: ${gems}`),
    row('Pet', `${items.currentPet ?? ''} (${foodCount} food items)`),
    row('Mount', items.currentMount ?? ''),
    row('Quest', quest),
  ];
}
