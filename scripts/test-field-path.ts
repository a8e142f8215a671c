#!/usr/bin/env node
import { getNestedFieldValue, resolveChoiceLabel } from '../src/portal/fieldPath';
import type { ChoiceLabels } from '../src/portal/displaySettings';
import type { ProfileAttributes } from '../src/portal/types';

const profile: ProfileAttributes = {
  student_id: 'ST-9',
  group: {
    name: 'CS-1',
    specialization: { name: 'Computer Science', department: null },
  },
  has_dormitory: false,
  tags: ['a', 'b'],
  empty: null,
};

const checks: Array<[string, unknown]> = [
  ['student_id', 'ST-9'],
  ['group.name', 'CS-1'],
  ['group.specialization.name', 'Computer Science'],
  ['group.specialization.department.faculty.name', undefined],
  ['group.missing.name', undefined],
  ['has_dormitory', false],
  ['tags.length', undefined],
  ['empty', undefined],
  ['toString', undefined],
  ['group.name.length', undefined],
];

for (const [path, expected] of checks) {
  const actual = getNestedFieldValue(profile, path);
  if (actual !== expected) {
    throw new Error(`getNestedFieldValue(${path}) expected ${String(expected)}, got ${String(actual)}.`);
  }
}

if (getNestedFieldValue(null, 'group.name') !== undefined) {
  throw new Error('getNestedFieldValue should return undefined for a null object.');
}

const choices: ChoiceLabels = {
  education_form: {
    full_time: { en: 'Full-time', ru: 'Очная' },
    evening: { en: 'Evening' },
  },
  access_level: { '3': { en: 'Advanced', ru: 'Продвинутый' } },
};

const labelChecks: Array<[string, string | number, 'en' | 'ru', string]> = [
  ['education_form', 'full_time', 'en', 'Full-time'],
  ['education_form', 'full_time', 'ru', 'Очная'],
  ['education_form', 'evening', 'ru', 'Evening'],
  ['education_form', 'unknown_code', 'en', 'unknown_code'],
  ['access_level', 3, 'ru', 'Продвинутый'],
  ['no_such_attribute', 'x', 'en', 'x'],
];

for (const [attribute, code, locale, expected] of labelChecks) {
  const actual = resolveChoiceLabel(choices, attribute, code, locale);
  if (actual !== expected) {
    throw new Error(`resolveChoiceLabel(${attribute}, ${code}, ${locale}) expected ${expected}, got ${actual}.`);
  }
}

console.log('field path test passed.');
