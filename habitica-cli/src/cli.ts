#!/usr/bin/env node
import path from 'path';
import open from 'open';
import { DEFAULT_TIMEOUT_MS, HabiticaClient } from './api.js';
import { runCommand } from './commands.js';
import { loadCredentials } from './credentials.js';
import { HabiticaCliError, UsageError, errorMessage } from './errors.js';
import { createLogger, levelFromFlags } from './logger.js';
import { CACHE_FILE_NAME, QuestCacheStore } from './quest-cache.js';
import { FixedDelayRateLimiter } from './rate-limiter.js';
import { isDifficulty } from './stable.js';
import { ensureDir, parseArgs, parseNumber, resolveConfigDir } from './utils.js';

const VERSION = 'habitica-cli 0.1.0';

const args = parseArgs(process.argv.slice(2));
if (args.help || args.h) {
  printHelp();
  process.exit(0);
}
if (args.version) {
  console.log(VERSION);
  process.exit(0);
}

const logger = createLogger(levelFromFlags({ verbose: Boolean(args.verbose), debug: Boolean(args.debug) }));

async function main() {
  const [command, ...commandArgs] = args._;
  if (!command) {
    printHelp();
    throw new UsageError('No command given');
  }

  const difficulty = String(args.difficulty ?? 'easy');
  if (!isDifficulty(difficulty)) {
    throw new UsageError(`--difficulty must be easy, medium or hard (got "${difficulty}")`);
  }

  const configDir = resolveConfigDir(args['config-dir']);
  logger.debug('Loading habitica auth data', { configDir });
  const credentials = loadCredentials(configDir);

  ensureDir(configDir);
  const questCache = new QuestCacheStore(path.join(configDir, CACHE_FILE_NAME));

  const timeoutMs =
    parseNumber(args['timeout-ms']) ||
    parseNumber(process.env.HABITICA_TIMEOUT_MS) ||
    DEFAULT_TIMEOUT_MS;

  const api = new HabiticaClient({ credentials, timeoutMs, logger });
  try {
    await runCommand(
      {
        api,
        out: (line) => console.log(line),
        logger,
        limiter: new FixedDelayRateLimiter(),
        questCache,
        siteUrl: credentials.url,
        difficulty,
        openUrl: async (url) => {
          await open(url);
        },
      },
      command,
      commandArgs
    );
  } finally {
    questCache.close();
  }
}

main().catch((err) => {
  console.error(`habitica: ${errorMessage(err)}`);
  if (args.debug && err instanceof Error && err.stack) {
    console.error(err.stack);
  } else if (!(err instanceof HabiticaCliError)) {
    logger.error('unexpected failure', { name: err instanceof Error ? err.name : typeof err });
  }
  process.exit(1);
});

function printHelp() {
  console.log(`Usage: habitica [--version] [--help] <command> [<args>...]
                [--difficulty=<d>] [--verbose | --debug]

Options:
  -h --help              Show this screen
  --version              Show version
  --difficulty=<d>       (easy | medium | hard) [default: easy]
  --config-dir <path>    Directory holding auth.json and the quest cache
                         (default: $HABITICA_CONFIG_DIR or ~/.config/habitica)
  --timeout-ms <ms>      HTTP request timeout (default 30000)
  --verbose              Show some logging information
  --debug                Show all logging information

Commands:
  status                 Show HP, XP, GP, and more
  habits                 List habit tasks
  habits up <task-id>    Up (+) habit <task-id>
  habits down <task-id>  Down (-) habit <task-id>
  dailies                List daily tasks
  dailies done           Mark daily <task-id> complete
  dailies undo           Mark daily <task-id> incomplete
  todos                  List todo tasks
  todos done <task-id>   Mark one or more todo <task-id> completed
  todos add <task>       Add todo with description <task>
  server                 Show status of Habitica service
  home                   Open tasks page in default browser
  item [type]            Show item types, or specific items of given type
  feed                   Feed all food to matching pets
  hatch                  Use potions to hatch eggs, sell unneeded eggs
  sell [type|all]        Sell all potions of type or "all"

For \`habits up|down\`, \`dailies done|undo\`, and \`todos done\`, you can pass
one or more <task-id> parameters, using either comma-separated lists or
ranges or both. For example, \`todos done 1,3,6-9,11\`.`);
}
