import { I18n } from '@grammyjs/i18n';

export function initLocaleEngine(directory: string) {
  return new I18n({
    defaultLanguage: 'en',
    defaultLanguageOnMissing: true,
    directory,
    useSession: false,
  });
}
