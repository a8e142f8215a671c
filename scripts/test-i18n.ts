#!/usr/bin/env node
import { formatDate, parseLocaleTable, roleMessageKey, translate } from '../src/portal/i18n';
import { loadMessages } from './testData';

const messages = loadMessages();

if (translate(messages, 'en', 'common.no') !== 'No') throw new Error('English "No" expected.');
if (translate(messages, 'ru', 'common.no') !== 'Нет') throw new Error('Russian "Нет" expected.');
if (translate(messages, 'ru', roleMessageKey('teacher')) !== 'Преподаватель') {
  throw new Error('Role names should be localized.');
}

const partial = parseLocaleTable({
  version: 1,
  messages: {
    en: Object.fromEntries(Object.entries(messages.messages.en)),
    ru: { 'common.yes': 'Да' },
  },
});
if (translate(partial, 'ru', 'common.yes') !== 'Да') throw new Error('Russian override should be used.');
if (translate(partial, 'ru', 'common.no') !== 'No') throw new Error('Missing Russian key should fall back to English.');

let rejected = false;
try {
  parseLocaleTable({ version: 1, messages: { en: { 'common.yes': 'Yes' } } });
} catch (err) {
  rejected = err instanceof Error && err.message.startsWith('English messages are missing: common.no');
}
if (!rejected) throw new Error('Incomplete English table should be rejected.');

rejected = false;
try {
  parseLocaleTable({ version: 1, messages: { en: { ...messages.messages.en, 'no.such.key': 'x' } } });
} catch (err) {
  rejected = err instanceof Error && err.message === 'Unknown message key "no.such.key" in locale en';
}
if (!rejected) throw new Error('Unknown message keys should be rejected.');

if (formatDate('2001-03-14', 'en') !== 'March 14, 2001') {
  throw new Error(`Unexpected English date: ${formatDate('2001-03-14', 'en')}`);
}
if (formatDate('not a date', 'en') !== 'not a date') throw new Error('Non-ISO text should pass through.');

console.log('i18n test passed.');
