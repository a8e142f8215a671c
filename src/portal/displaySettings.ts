import { USER_ROLES, isUserRole, type LocalizedText, type UserRole } from './types';
import { expectRecord, isRecord, readBooleanMap, type PlainRecord } from './validate';

/** How a section's content is read from a user record. */
export type SectionContentSource = 'body' | 'text' | 'list' | 'stats';

const SECTION_CONTENT_SOURCES: SectionContentSource[] = ['body', 'text', 'list', 'stats'];

function isSectionContentSource(value: unknown): value is SectionContentSource {
  return typeof value === 'string' && (SECTION_CONTENT_SOURCES as readonly string[]).includes(value);
}

export type FieldConfig = {
  key: string; // dotted attribute path
  label: LocalizedText;
  choice: boolean;
  boolean: boolean;
  date: boolean;
};

export type SectionConfig = {
  key: string;
  label: LocalizedText;
  content: SectionContentSource;
  path: string;
};

export type ChoiceLabels = Record<string, Record<string, LocalizedText>>;

export type RoleCatalog = {
  fields: FieldConfig[];
  sections: SectionConfig[];
  choices: ChoiceLabels;
};

export type FieldCatalog = {
  version: 1;
  roles: Record<UserRole, RoleCatalog>;
};

export type RoleDisplayToggles = {
  fields: Record<string, boolean>;
  sections: Record<string, boolean>;
};

export type ProfileDisplay = Record<UserRole, RoleDisplayToggles>;

export type RoleDisplay = {
  role: UserRole;
  fields: Array<FieldConfig & { visible: boolean }>;
  sections: Array<SectionConfig & { visible: boolean }>;
  choices: ChoiceLabels;
  showStatistics: boolean;
};

export const STATISTICS_SECTION_KEY = 'statistics';

function parseLocalizedText(raw: unknown, context: string): LocalizedText {
  const { en, ru } = expectRecord(raw, context);
  if (typeof en !== 'string') throw new Error(`${context}.en must be a string`);
  const text: LocalizedText = { en };
  if (typeof ru === 'string') text.ru = ru;
  return text;
}

function readFlag(obj: PlainRecord, key: string, context: string): boolean {
  const value = obj[key];
  if (value === undefined) return false;
  if (typeof value !== 'boolean') throw new Error(`${context}.${key} must be a boolean`);
  return value;
}

function parseRoleCatalog(raw: unknown, context: string): RoleCatalog {
  const obj = expectRecord(raw, context);
  const rawFields = obj.fields;
  const rawSections = obj.sections;
  if (!Array.isArray(rawFields)) throw new Error(`${context}.fields must be an array`);
  if (!Array.isArray(rawSections)) throw new Error(`${context}.sections must be an array`);

  const fields = rawFields.map((entry: unknown, i: number): FieldConfig => {
    const ctx = `${context}.fields[${i}]`;
    const field = expectRecord(entry, ctx);
    const key = field.key;
    if (typeof key !== 'string' || !key) throw new Error(`${ctx}.key must be a non-empty string`);
    return {
      key,
      label: parseLocalizedText(field.label, `${ctx}.label`),
      choice: readFlag(field, 'choice', ctx),
      boolean: readFlag(field, 'boolean', ctx),
      date: readFlag(field, 'date', ctx),
    };
  });

  const sections = rawSections.map((entry: unknown, i: number): SectionConfig => {
    const ctx = `${context}.sections[${i}]`;
    const section = expectRecord(entry, ctx);
    const { key, content } = section;
    if (typeof key !== 'string' || !key) throw new Error(`${ctx}.key must be a non-empty string`);
    if (!isSectionContentSource(content)) {
      throw new Error(`${ctx}.content must be one of ${SECTION_CONTENT_SOURCES.join(', ')}`);
    }
    const path = section.path === undefined ? key : section.path;
    if (typeof path !== 'string') throw new Error(`${ctx}.path must be a string`);
    return {
      key,
      label: parseLocalizedText(section.label, `${ctx}.label`),
      content,
      path,
    };
  });

  if (sections.filter(s => s.content === 'body').length > 1) {
    throw new Error(`${context} declares more than one body section`);
  }
  const seen = new Set<string>();
  for (const section of sections) {
    // Section keys become tab/panel ids.
    if (seen.has(section.key)) throw new Error(`${context} declares section "${section.key}" twice`);
    if (section.key === 'info') throw new Error(`${context} cannot declare a section named "info"`);
    seen.add(section.key);
  }

  const choices: ChoiceLabels = {};
  if (obj.choices !== undefined) {
    for (const [attribute, codes] of Object.entries(expectRecord(obj.choices, `${context}.choices`))) {
      const labels: Record<string, LocalizedText> = {};
      for (const [code, label] of Object.entries(expectRecord(codes, `${context}.choices.${attribute}`))) {
        labels[code] = parseLocalizedText(label, `${context}.choices.${attribute}.${code}`);
      }
      choices[attribute] = labels;
    }
  }

  return { fields, sections, choices };
}

/** Validate `profile-fields.v1.json`. Every role must be present. */
export function parseFieldCatalog(raw: unknown): FieldCatalog {
  const obj = expectRecord(raw, 'catalog');
  if (obj.version !== 1) throw new Error(`Unsupported field catalog version: ${String(obj.version)}`);
  const roles = expectRecord(obj.roles, 'catalog.roles');

  const parsed: Partial<Record<UserRole, RoleCatalog>> = {};
  for (const role of USER_ROLES) {
    const entry = roles[role];
    if (!isRecord(entry)) throw new Error(`catalog.roles.${role} is missing`);
    parsed[role] = parseRoleCatalog(entry, `catalog.roles.${role}`);
  }
  const { admin, teacher, student, methodist, dean } = parsed;
  if (!admin || !teacher || !student || !methodist || !dean) throw new Error('catalog.roles is incomplete');
  return { version: 1, roles: { admin, teacher, student, methodist, dean } };
}

/**
 * Validate the `profile_display` block of the portal config against the
 * catalog. Unlisted fields and sections stay visible.
 */
export function parseProfileDisplay(raw: unknown, catalog: FieldCatalog): ProfileDisplay {
  const obj: PlainRecord = raw === undefined || raw === null ? {} : expectRecord(raw, 'profile_display');

  for (const key of Object.keys(obj)) {
    if (!isUserRole(key)) throw new Error(`profile_display.${key} is not a known role`);
  }

  const build = (role: UserRole): RoleDisplayToggles => {
    const context = `profile_display.${role}`;
    const rawEntry = obj[role];
    const entry: PlainRecord = rawEntry === undefined || rawEntry === null ? {} : expectRecord(rawEntry, context);
    const fields = readBooleanMap(entry.fields, `${context}.fields`);
    const sections = readBooleanMap(entry.sections, `${context}.sections`);

    const roleCatalog = catalog.roles[role];
    const knownFields = new Set(roleCatalog.fields.map(f => f.key));
    const knownSections = new Set(roleCatalog.sections.map(s => s.key));
    for (const key of Object.keys(fields)) {
      if (!knownFields.has(key)) throw new Error(`${context}.fields.${key} is not a ${role} field`);
    }
    for (const key of Object.keys(sections)) {
      if (!knownSections.has(key)) throw new Error(`${context}.sections.${key} is not a ${role} section`);
    }
    return { fields, sections };
  };

  return {
    admin: build('admin'),
    teacher: build('teacher'),
    student: build('student'),
    methodist: build('methodist'),
    dean: build('dean'),
  };
}

export function resolveRoleDisplay(catalog: FieldCatalog, display: ProfileDisplay, role: UserRole): RoleDisplay {
  const roleCatalog = catalog.roles[role];
  const toggles = display[role];

  const fields = roleCatalog.fields.map(field => ({ ...field, visible: toggles.fields[field.key] ?? true }));
  const sections = roleCatalog.sections.map(section => ({ ...section, visible: toggles.sections[section.key] ?? true }));
  const showStatistics = sections.some(s => s.key === STATISTICS_SECTION_KEY && s.visible);

  return { role, fields, sections, choices: roleCatalog.choices, showStatistics };
}
