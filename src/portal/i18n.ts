import { LOCALES, type Locale, type UserRole } from './types';
import { expectRecord } from './validate';

export const MESSAGE_KEYS = [
  'common.yes',
  'common.no',
  'role.admin',
  'role.teacher',
  'role.student',
  'role.methodist',
  'role.dean',
  'nav.dashboard',
  'nav.schedule',
  'nav.grades',
  'nav.messages',
  'nav.profile',
  'nav.logout',
  'nav.openMenu',
  'nav.closeMenu',
  'flash.dismiss',
  'maintenance.banner',
  'footer.contacts',
  'profile.title',
  'profile.tabInfo',
  'profile.email',
  'profile.phone',
  'profile.dateOfBirth',
  'profile.print',
  'profile.empty',
  'directory.title',
] as const;

export type MessageKey = typeof MESSAGE_KEYS[number];

export type LocaleTable = {
  version: 1;
  messages: Record<Locale, Partial<Record<MessageKey, string>>>;
};

const MESSAGE_KEY_SET: ReadonlySet<string> = new Set(MESSAGE_KEYS);

function isMessageKey(value: string): value is MessageKey {
  return MESSAGE_KEY_SET.has(value);
}

/**
 * Validate `locales.v1.json`. English must define every key; other locales may
 * leave keys out and fall back to English.
 */
export function parseLocaleTable(raw: unknown): LocaleTable {
  const obj = expectRecord(raw, 'locales');
  if (obj.version !== 1) throw new Error(`Unsupported locale table version: ${String(obj.version)}`);
  const messagesRaw = expectRecord(obj.messages, 'locales.messages');

  const messages: LocaleTable['messages'] = { en: {}, ru: {} };
  for (const locale of LOCALES) {
    const entries = messagesRaw[locale];
    if (entries === undefined) continue;
    const table = expectRecord(entries, `locales.messages.${locale}`);
    for (const [key, text] of Object.entries(table)) {
      if (!isMessageKey(key)) throw new Error(`Unknown message key "${key}" in locale ${locale}`);
      if (typeof text !== 'string') throw new Error(`locales.messages.${locale}.${key} must be a string`);
      messages[locale][key] = text;
    }
  }

  const missing = MESSAGE_KEYS.filter(key => messages.en[key] === undefined);
  if (missing.length) throw new Error(`English messages are missing: ${missing.join(', ')}`);

  return { version: 1, messages };
}

export function translate(table: LocaleTable, locale: Locale, key: MessageKey): string {
  return table.messages[locale][key] ?? table.messages.en[key] ?? key;
}

const ROLE_MESSAGE_KEYS: Record<UserRole, MessageKey> = {
  admin: 'role.admin',
  teacher: 'role.teacher',
  student: 'role.student',
  methodist: 'role.methodist',
  dean: 'role.dean',
};

export function roleMessageKey(role: UserRole): MessageKey {
  return ROLE_MESSAGE_KEYS[role];
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** `YYYY-MM-DD` to a long local date; anything else is returned unchanged. */
export function formatDate(iso: string, locale: Locale): string {
  const match = ISO_DATE.exec(iso);
  if (!match) return iso;
  const date = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
  if (Number.isNaN(date.getTime())) return iso;
  return new Intl.DateTimeFormat(locale, { year: 'numeric', month: 'long', day: 'numeric', timeZone: 'UTC' }).format(date);
}
