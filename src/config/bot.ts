import type { I18n } from '@grammyjs/i18n';
import { Bot as TelegramBot } from 'grammy';
import { resolvePath } from '../helpers/resolve-path.js';
import { reportController } from '../modules/report/controller.js';
import { seekController } from '../modules/seek/controller.js';
import { startController } from '../modules/start/controller.js';
import type { Bot } from '../modules/telegram/bot.js';
import { type CustomContext, createReplyWithTextFunc } from '../modules/telegram/context.js';
import type { MarketDataSource } from '../modules/yield/types.js';
import type { Config, EvaluationSettings } from './env.js';
import { initLocaleEngine } from './locale-engine.js';

function extendContext(bot: Bot, market: MarketDataSource, settings: EvaluationSettings) {
  bot.use(async (ctx, next) => {
    if (!ctx.chat || !ctx.from) {
      return;
    }

    ctx.text = createReplyWithTextFunc(ctx);
    ctx.market = market;
    ctx.settings = settings;

    await next();
  });
}

function setupMiddlewares(bot: Bot, localeEngine: I18n) {
  bot.use(localeEngine.middleware());
  bot.catch(console.error);
}

function setupControllers(bot: Bot) {
  bot.use(startController);
  bot.use(reportController);
  bot.use(seekController);
}

async function publishCommands(bot: Bot) {
  await bot.api.setMyCommands([
    { command: 'report', description: 'Yield of one strike across expirations' },
    { command: 'seek', description: 'Safest strike per expiration above a target yield' },
    { command: 'help', description: 'Usage' },
  ]);
}

export async function startBot(config: Config, market: MarketDataSource) {
  const bot: Bot = new TelegramBot<CustomContext>(config.TOKEN);

  const localesPath = resolvePath(import.meta.url, '../../locales');
  const i18n = initLocaleEngine(localesPath);

  extendContext(bot, market, {
    REPORT_SCAN_LIMIT: config.REPORT_SCAN_LIMIT,
    SEEK_SCAN_LIMIT: config.SEEK_SCAN_LIMIT,
    DEFAULT_MIN_RETURN_PCT: config.DEFAULT_MIN_RETURN_PCT,
    DEFAULT_STRIKE: config.DEFAULT_STRIKE,
  });
  setupMiddlewares(bot, i18n);
  setupControllers(bot);
  await publishCommands(bot);

  return new Promise<Bot>((resolve, reject) => {
    bot.start({ onStart: () => resolve(bot) }).catch(reject);
  });
}
