import type { I18nContextFlavor, TemplateData } from '@grammyjs/i18n';
import type { Context } from 'grammy';

import type { EvaluationSettings } from '../../config/env.js';
import type { Translate } from '../utils/formatting.js';
import type { MarketDataSource } from '../yield/types.js';
import type { Extra } from './bot.js';

export interface Custom<C extends Context> {
  text: (text: string, templateData?: TemplateData, extra?: Extra) => ReturnType<C['reply']>;

  market: MarketDataSource;

  settings: EvaluationSettings;
}

export type CustomContextMethods = Custom<Context>;

export type CustomContext = Context & Custom<Context> & I18nContextFlavor;

export function createReplyWithTextFunc(ctx: CustomContext): CustomContextMethods['text'] {
  return (resourceKey, templateData, extra = {}) => {
    const text = ctx.i18n.t(resourceKey, templateData);
    return replyWithHtml(ctx, text, extra);
  };
}

export function replyWithHtml(ctx: Context, text: string, extra: Extra = {}) {
  extra.parse_mode = 'HTML';
  extra.link_preview_options = {
    is_disabled: true,
  };
  return ctx.reply(text, extra);
}

export function createTranslator(ctx: CustomContext): Translate {
  return (key, params) => ctx.i18n.t(key, params);
}
