/**
 * Profile view composer.
 *
 * Turns a user record plus the role's display settings into the two mappings
 * the profile page renders: `fieldsValues` (info tab rows) and
 * `sectionsValues` (one tab each). Inputs are trusted to be already filtered
 * for the viewer; nothing here makes access decisions.
 */

import { getNestedFieldValue, resolveChoiceLabel } from './fieldPath';
import { formatDate, roleMessageKey, translate, type LocaleTable } from './i18n';
import type { ChoiceLabels, FieldConfig, RoleDisplay, SectionConfig } from './displaySettings';
import {
  pickLocalized,
  type FieldValue,
  type Locale,
  type PortalUser,
  type ProfileAttributeValue,
  type ProfileAttributes,
  type ProfileView,
  type SectionContent,
  type SectionValue,
  type StatEntry,
} from './types';

export type ComposeProfileInput = {
  user: PortalUser;
  display: RoleDisplay;
  locale: Locale;
  messages: LocaleTable;
};

function composeFieldValue(
  field: FieldConfig,
  profile: ProfileAttributes,
  choices: ChoiceLabels,
  locale: Locale,
): FieldValue['value'] | null {
  const raw = getNestedFieldValue(profile, field.key);

  // false is a value, not an absence
  if (field.boolean) return typeof raw === 'boolean' ? raw : null;

  if (typeof raw === 'number') {
    return field.choice ? resolveChoiceLabel(choices, field.key, raw, locale) : raw;
  }
  if (typeof raw !== 'string') return null;

  const text = raw.trim();
  if (!text) return null;
  if (field.choice) return resolveChoiceLabel(choices, field.key, text, locale);
  if (field.date) return formatDate(text, locale);
  return text;
}

function textContent(raw: ProfileAttributeValue | undefined): SectionContent | null {
  if (typeof raw !== 'string') return null;
  const markdown = raw.trim();
  return markdown ? { kind: 'text', markdown } : null;
}

function listItemName(item: ProfileAttributeValue): string | null {
  if (typeof item === 'string') return item.trim() || null;
  if (typeof item === 'number') return String(item);
  if (item && typeof item === 'object' && !Array.isArray(item)) {
    const name = item.name;
    if (typeof name === 'string' && name.trim()) return name.trim();
  }
  return null;
}

function listContent(raw: ProfileAttributeValue | undefined): SectionContent | null {
  if (!Array.isArray(raw)) return null;
  const items = raw.map(listItemName).filter((name): name is string => name !== null);
  return items.length ? { kind: 'list', items } : null;
}

function statValue(value: ProfileAttributeValue | undefined): string | null {
  if (typeof value === 'number') return String(value);
  if (typeof value === 'string' && value.trim()) return value.trim();
  return null;
}

function statsContent(raw: ProfileAttributeValue | undefined): SectionContent | null {
  const stats: StatEntry[] = [];

  if (Array.isArray(raw)) {
    // [{ label, value }, ...] keeps author order
    for (const entry of raw) {
      if (!entry || typeof entry !== 'object' || Array.isArray(entry)) continue;
      const label = entry.label;
      const value = statValue(entry.value);
      if (typeof label === 'string' && label.trim() && value !== null) stats.push({ label: label.trim(), value });
    }
  } else if (raw && typeof raw === 'object') {
    for (const [label, rawValue] of Object.entries(raw)) {
      const value = statValue(rawValue);
      if (value !== null) stats.push({ label, value });
    }
  }

  return stats.length ? { kind: 'stats', stats } : null;
}

function composeSectionContent(section: SectionConfig, user: PortalUser): SectionContent | null {
  switch (section.content) {
    case 'body':
      return textContent(user.about);
    case 'text':
      return textContent(getNestedFieldValue(user.profile, section.path));
    case 'list':
      return listContent(getNestedFieldValue(user.profile, section.path));
    case 'stats':
      return statsContent(getNestedFieldValue(user.profile, section.path));
  }
}

export function composeProfileView({ user, display, locale, messages }: ComposeProfileInput): ProfileView {
  if (display.role !== user.role) {
    throw new Error(`Display settings for ${display.role} cannot render a ${user.role} profile (${user.username})`);
  }

  const fieldsValues = new Map<string, FieldValue>();
  for (const field of display.fields) {
    if (!field.visible) continue;
    const value = composeFieldValue(field, user.profile, display.choices, locale);
    if (value === null) continue;
    fieldsValues.set(field.key, {
      displayName: pickLocalized(field.label, locale),
      value,
      isBoolean: field.boolean,
    });
  }

  const sectionsValues = new Map<string, SectionValue>();
  for (const section of display.sections) {
    if (!section.visible) continue;
    sectionsValues.set(section.key, {
      displayName: pickLocalized(section.label, locale),
      value: composeSectionContent(section, user),
    });
  }

  return {
    user,
    roleDisplay: translate(messages, locale, roleMessageKey(user.role)),
    fieldsValues,
    sectionsValues,
    showStatistics: display.showStatistics,
  };
}
