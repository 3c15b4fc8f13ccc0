import { CommandGroup } from '@grammyjs/commands';

import type { CustomContext } from '../telegram/context.js';

export const startController = new CommandGroup<CustomContext>();

startController.command('start', 'Usage', async ctx => {
  await ctx.text('start', { strike: ctx.settings.DEFAULT_STRIKE, target: ctx.settings.DEFAULT_MIN_RETURN_PCT });
});

startController.command('help', 'Usage', async ctx => {
  await ctx.text('start', { strike: ctx.settings.DEFAULT_STRIKE, target: ctx.settings.DEFAULT_MIN_RETURN_PCT });
});
