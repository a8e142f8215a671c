import { pickLocalized, type Locale, type ProfileAttributeValue, type ProfileAttributes } from './types';
import type { ChoiceLabels } from './displaySettings';

function isAttributeRecord(value: ProfileAttributeValue | undefined): value is ProfileAttributes {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a dotted attribute path such as `group.specialization.name`.
 * A missing or null link anywhere along the path yields `undefined`.
 */
export function getNestedFieldValue(
  obj: ProfileAttributes | null | undefined,
  path: string,
): ProfileAttributeValue | undefined {
  let current: ProfileAttributeValue | undefined = obj ?? undefined;
  for (const part of path.split('.')) {
    if (!isAttributeRecord(current)) return undefined;
    if (!Object.prototype.hasOwnProperty.call(current, part)) return undefined;
    current = current[part];
  }
  return current === null ? undefined : current;
}

/** Display label of a choice code; unknown codes are shown as-is. */
export function resolveChoiceLabel(
  choices: ChoiceLabels,
  attribute: string,
  code: string | number,
  locale: Locale,
): string {
  const label = choices[attribute]?.[String(code)];
  return label ? pickLocalized(label, locale) : String(code);
}
