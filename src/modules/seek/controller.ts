import { CommandGroup } from '@grammyjs/commands';
import type { CustomContext } from '../telegram/context.js';
import { createTranslator, replyWithHtml } from '../telegram/context.js';
import { parseSeekArgs } from '../telegram/args.js';
import { withProgressMessage } from '../telegram/progress.js';
import { formatPercent } from '../utils/formatting.js';
import { evaluateSeek } from '../yield/service.js';
import type { ExpirationOutcome } from '../yield/types.js';
import { buildSeekMessage, buildSeekProgress } from './formatting.js';

export const seekController = new CommandGroup<CustomContext>();

export async function handleSeekCommand(ctx: CustomContext) {
  if (!ctx.chat) return;
  const chatId = ctx.chat.id;

  const raw = typeof ctx.match === 'string' ? ctx.match : '';
  const parsed = parseSeekArgs(raw, ctx.settings.DEFAULT_MIN_RETURN_PCT);
  if (!parsed.success) {
    await ctx.text('seek.usage');
    return;
  }

  const { ticker, side, minAnnualReturnPct, horizonMonths } = parsed.args;
  const i18nT = createTranslator(ctx);
  const progressMessage = await ctx.text('seek.started', { ticker, target: formatPercent(minAnnualReturnPct) });

  const onProgress = async (outcome: ExpirationOutcome, index: number, total: number) => {
    try {
      await ctx.api.editMessageText(
        chatId,
        progressMessage.message_id,
        buildSeekProgress(i18nT, index, total, outcome.expiration),
        { parse_mode: 'HTML' },
      );
    } catch (error) {
      console.error('[SEEK] Failed to update progress:', error);
    }
  };

  const evaluation = await withProgressMessage(ctx.api, chatId, progressMessage.message_id, () =>
    evaluateSeek(ctx.market, {
      ticker,
      side,
      minAnnualReturnPct,
      horizonMonths,
      scanLimit: ctx.settings.SEEK_SCAN_LIMIT,
      onProgress,
    }),
  );

  if (!evaluation.success) {
    await ctx.text(`errors.${evaluation.error}`, { ticker });
    return;
  }

  const message = buildSeekMessage(
    i18nT,
    ticker,
    side,
    minAnnualReturnPct,
    evaluation.spotPrice,
    evaluation.result,
  );
  await replyWithHtml(ctx, message);
}

seekController.command('seek', 'Safest strike per expiration above a target yield', async ctx => {
  await handleSeekCommand(ctx);
});

seekController.command('s', '', async ctx => {
  await handleSeekCommand(ctx);
});
