#!/usr/bin/env node
import { parseFieldCatalog, parseProfileDisplay, resolveRoleDisplay } from '../src/portal/displaySettings';
import { USER_ROLES } from '../src/portal/types';
import { loadCatalog } from './testData';

function expectThrows(fn: () => unknown, expected: string) {
  try {
    fn();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (message !== expected) throw new Error(`Expected "${expected}", got "${message}".`);
    return;
  }
  throw new Error(`Expected error "${expected}".`);
}

const catalog = loadCatalog();

const personalInfo = catalog.roles.student.sections[0];
if (personalInfo.key !== 'personal_info' || personalInfo.path !== 'personal_info' || personalInfo.content !== 'body') {
  throw new Error('Section path should default to the section key.');
}
const dormitory = catalog.roles.student.fields.find(f => f.key === 'has_dormitory');
if (!dormitory || !dormitory.boolean || dormitory.choice) throw new Error('has_dormitory should be a boolean field.');
if (catalog.roles.dean.sections.length !== 0) throw new Error('Dean profiles have no sections.');

// Defaults: everything visible.
const defaults = parseProfileDisplay(undefined, catalog);
const student = resolveRoleDisplay(catalog, defaults, 'student');
if (!student.fields.every(f => f.visible) || !student.sections.every(s => s.visible)) {
  throw new Error('Unlisted fields and sections should be visible.');
}
if (!student.showStatistics) throw new Error('Student statistics should show by default.');
if (resolveRoleDisplay(catalog, defaults, 'teacher').showStatistics) {
  throw new Error('Roles without a statistics section never show statistics.');
}

const toggled = parseProfileDisplay(
  { student: { fields: { student_id: false }, sections: { statistics: false, skills: true } } },
  catalog,
);
const hidden = resolveRoleDisplay(catalog, toggled, 'student');
const studentId = hidden.fields.find(f => f.key === 'student_id');
if (!studentId || studentId.visible) throw new Error('student_id should be hidden.');
if (hidden.showStatistics) throw new Error('Hidden statistics section should turn showStatistics off.');
if (hidden.sections.filter(s => !s.visible).map(s => s.key).join(',') !== 'statistics') {
  throw new Error('Only the statistics section should be hidden.');
}
if (hidden.choices.education_form?.full_time?.en !== 'Full-time') throw new Error('Role choices should be carried.');

expectThrows(() => parseProfileDisplay({ janitor: {} }, catalog), 'profile_display.janitor is not a known role');
expectThrows(
  () => parseProfileDisplay({ student: { fields: { nope: true } } }, catalog),
  'profile_display.student.fields.nope is not a student field',
);
expectThrows(
  () => parseProfileDisplay({ teacher: { sections: { statistics: true } } }, catalog),
  'profile_display.teacher.sections.statistics is not a teacher section',
);
expectThrows(
  () => parseProfileDisplay({ student: { sections: { statistics: 'yes' } } }, catalog),
  'profile_display.student.sections.statistics must be a boolean',
);

function minimalCatalog(studentSections: unknown[]) {
  const roles: Record<string, unknown> = {};
  for (const role of USER_ROLES) roles[role] = { fields: [], sections: [] };
  roles.student = { fields: [], sections: studentSections };
  return { version: 1, roles };
}

const body = (key: string) => ({ key, label: { en: key }, content: 'body' });

if (parseFieldCatalog(minimalCatalog([body('about')])).roles.student.sections.length !== 1) {
  throw new Error('A minimal catalog should parse.');
}
expectThrows(() => parseFieldCatalog({ ...minimalCatalog([]), version: 2 }), 'Unsupported field catalog version: 2');
expectThrows(
  () => parseFieldCatalog(minimalCatalog([body('about'), body('bio')])),
  'catalog.roles.student declares more than one body section',
);
expectThrows(
  () => parseFieldCatalog(minimalCatalog([{ key: 'skills', label: { en: 'Skills' }, content: 'list' }, { key: 'skills', label: { en: 'Skills' }, content: 'list' }])),
  'catalog.roles.student declares section "skills" twice',
);
expectThrows(
  () => parseFieldCatalog(minimalCatalog([{ key: 'info', label: { en: 'Info' }, content: 'text' }])),
  'catalog.roles.student cannot declare a section named "info"',
);
expectThrows(
  () => parseFieldCatalog(minimalCatalog([{ key: 'notes', label: { en: 'Notes' }, content: 'html' }])),
  'catalog.roles.student.sections[0].content must be one of body, text, list, stats',
);

const noDean = minimalCatalog([]);
delete noDean.roles.dean;
expectThrows(() => parseFieldCatalog(noDean), 'catalog.roles.dean is missing');

console.log('display settings test passed.');
