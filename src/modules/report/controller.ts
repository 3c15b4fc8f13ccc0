import { CommandGroup } from '@grammyjs/commands';
import type { CustomContext } from '../telegram/context.js';
import { createTranslator, replyWithHtml } from '../telegram/context.js';
import { parseReportArgs } from '../telegram/args.js';
import { formatPrice } from '../utils/formatting.js';
import { evaluateReport } from '../yield/service.js';
import { buildReportMessage } from './formatting.js';

export const reportController = new CommandGroup<CustomContext>();

export async function handleReportCommand(ctx: CustomContext) {
  const raw = typeof ctx.match === 'string' ? ctx.match : '';
  const parsed = parseReportArgs(raw, ctx.settings.DEFAULT_STRIKE);
  if (!parsed.success) {
    await ctx.text('report.usage');
    return;
  }

  const { ticker, side, targetStrike, horizonMonths } = parsed.args;
  await ctx.text('report.started', { ticker, strike: formatPrice(targetStrike) });

  const evaluation = await evaluateReport(ctx.market, {
    ticker,
    side,
    targetStrike,
    horizonMonths,
    scanLimit: ctx.settings.REPORT_SCAN_LIMIT,
  });
  if (!evaluation.success) {
    await ctx.text(`errors.${evaluation.error}`, { ticker });
    return;
  }

  const message = buildReportMessage(
    createTranslator(ctx),
    ticker,
    side,
    targetStrike,
    evaluation.spotPrice,
    evaluation.result,
  );
  await replyWithHtml(ctx, message);
}

reportController.command('report', 'Annualized yield of one strike across expirations', async ctx => {
  await handleReportCommand(ctx);
});

reportController.command('r', '', async ctx => {
  await handleReportCommand(ctx);
});
