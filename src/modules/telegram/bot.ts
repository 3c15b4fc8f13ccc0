import type { Bot as TelegramBot, Context } from 'grammy';
import type { CustomContext } from './context.js';

export type Bot = TelegramBot<CustomContext>;

export type Extra = NonNullable<Parameters<Context['reply']>[1]>;
