import { UnexpectedShapeError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { NO_QUEST, type QuestCache } from './quest-cache.js';
import { QuestContentSchema, parseShape, type Party } from './schemas.js';
import type { HabiticaApi, QuestCacheRecord } from './types.js';

/** Smallest key, so quests with several collect objectives always report the same one. */
export function firstKey(record: Readonly<Record<string, unknown>>): string | undefined {
  return Object.keys(record).sort()[0];
}

/**
 * Fetches /content for a quest the cache does not know yet. /content is large,
 * so the result is only refreshed when the party's quest key changes.
 */
export async function refreshQuestCache(
  api: Pick<HabiticaApi, 'getContent'>,
  cache: QuestCache,
  questKey: string,
  logger: Logger = silentLogger
): Promise<QuestCacheRecord> {
  logger.info('Updating quest information...', { questKey });
  const content = await api.getContent();
  if (!Object.prototype.hasOwnProperty.call(content.quests, questKey)) {
    throw new UnexpectedShapeError(`content.quests.${questKey}`, 'quest not found');
  }
  const quest = parseShape(QuestContentSchema, content.quests[questKey], `content.quests.${questKey}`);

  let questType: QuestCacheRecord['questType'] = '';
  let questMax = '-1';
  const collectKey = quest.collect ? firstKey(quest.collect) : undefined;
  if (quest.collect && collectKey !== undefined) {
    logger.debug('On a collection type of quest', { questKey, collectKey });
    questType = 'collect';
    questMax = String(quest.collect[collectKey].count);
  } else if (quest.boss) {
    logger.debug('On a boss/hp type of quest', { questKey });
    questType = 'hp';
    questMax = String(quest.boss.hp);
  }

  return cache.update({ questKey, questType, questMax, questTitle: quest.text });
}

function questProgress(party: Party, questType: QuestCacheRecord['questType']): number {
  const progress = party.quest?.progress;
  if (questType === 'collect') {
    const collect = progress?.collect;
    const key = collect ? firstKey(collect) : undefined;
    if (!collect || key === undefined) {
      throw new UnexpectedShapeError('party.quest.progress.collect', 'no collect objective');
    }
    const entry = collect[key];
    return typeof entry === 'number' ? entry : entry.count;
  }
  if (progress?.hp === undefined) {
    throw new UnexpectedShapeError('party.quest.progress.hp');
  }
  return progress.hp;
}

/** One-line quest status, e.g. `12/20 "The Basi-List"`. */
export async function resolveQuestSummary(
  api: Pick<HabiticaApi, 'getContent'>,
  party: Party | null,
  cache: QuestCache,
  logger: Logger = silentLogger
): Promise<string> {
  const quest = party?.quest;
  if (!party || !quest || !quest.active || !quest.key) {
    return NO_QUEST;
  }

  let record = cache.read();
  if (record.questKey !== quest.key) {
    record = await refreshQuestCache(api, cache, quest.key, logger);
  }

  const progress = questProgress(party, record.questType);
  return `${Math.trunc(progress)}/${record.questMax} "${record.questTitle}"`;
}
