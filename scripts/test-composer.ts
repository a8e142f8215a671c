#!/usr/bin/env node
import { composeProfileView } from '../src/portal/composer';
import { parseProfileDisplay, resolveRoleDisplay } from '../src/portal/displaySettings';
import type { PortalUser, SectionContent } from '../src/portal/types';
import { loadCatalog, loadMessages, makeStudent } from './testData';

const catalog = loadCatalog();
const messages = loadMessages();
const defaults = parseProfileDisplay(undefined, catalog);
const studentDisplay = resolveRoleDisplay(catalog, defaults, 'student');

function describeContent(content: SectionContent | null): string {
  if (!content) return 'null';
  switch (content.kind) {
    case 'text':
      return `text:${content.markdown}`;
    case 'list':
      return `list:${content.items.join('|')}`;
    case 'stats':
      return `stats:${content.stats.map(s => `${s.label}=${s.value}`).join('|')}`;
  }
}

// ============================================================================
// Student with default display settings
// ============================================================================

const view = composeProfileView({ user: makeStudent(), display: studentDisplay, locale: 'en', messages });

if (view.roleDisplay !== 'Student') throw new Error(`Unexpected role display: ${view.roleDisplay}`);
if (!view.showStatistics) throw new Error('Statistics should show by default.');

const fieldKeys = [...view.fieldsValues.keys()].join(',');
const expectedFieldKeys = [
  'group.specialization.name',
  'group.name',
  'student_id',
  'education_form',
  'education_basis',
  'enrollment_year',
  'current_semester',
  'academic_status',
  'scholarship_status',
  'has_dormitory',
].join(',');
if (fieldKeys !== expectedFieldKeys) throw new Error(`Unexpected field order: ${fieldKeys}`);

const form = view.fieldsValues.get('education_form');
if (!form || form.value !== 'Full-time' || form.displayName !== 'Form of study') {
  throw new Error('Choice codes should resolve to their labels.');
}
if (view.fieldsValues.get('academic_status')?.value !== 'Studying') throw new Error('academic_status label expected.');
if (view.fieldsValues.get('enrollment_year')?.value !== 2023) throw new Error('Plain numbers should stay numbers.');
if (view.fieldsValues.get('group.specialization.name')?.value !== 'Mathematics') {
  throw new Error('Nested paths should resolve.');
}

const dorm = view.fieldsValues.get('has_dormitory');
if (!dorm || dorm.value !== false || !dorm.isBoolean) throw new Error('false booleans should be kept as values.');
if (view.fieldsValues.get('student_id')?.isBoolean !== false) throw new Error('Text fields are not booleans.');

const sections = [...view.sectionsValues.entries()].map(([key, section]) => `${key}=${describeContent(section.value)}`);
const expectedSections = [
  'personal_info=null',
  'skills=list:Algebra|Statistics',
  'certificates=null',
  'achievements=null',
  'courses=null',
  'activity=text:Chess club',
  'statistics=stats:Average grade=4.5|Attendance=90%',
];
if (sections.join('\n') !== expectedSections.join('\n')) throw new Error(`Unexpected sections:\n${sections.join('\n')}`);
if (view.sectionsValues.get('skills')?.displayName !== 'Skills') throw new Error('Section label expected.');

// ============================================================================
// Hidden entries, odd values, Russian locale
// ============================================================================

const hiddenDisplay = resolveRoleDisplay(
  catalog,
  parseProfileDisplay({ student: { fields: { student_id: false }, sections: { statistics: false } } }, catalog),
  'student',
);
const oddStudent = makeStudent({
  about: '  Likes **proofs**.  ',
  profile: {
    student_id: 'ST-2',
    group: { name: '   ' },
    education_form: 'exchange',
    has_dormitory: 'yes',
    statistics: [{ label: 'GPA', value: 4.8 }],
  },
});
const ruView = composeProfileView({ user: oddStudent, display: hiddenDisplay, locale: 'ru', messages });

if (ruView.roleDisplay !== 'Студент') throw new Error('Role display should be translated.');
if (ruView.showStatistics) throw new Error('Hidden statistics should turn showStatistics off.');
if (ruView.fieldsValues.has('student_id')) throw new Error('Hidden fields should be left out.');
if (ruView.fieldsValues.has('group.name')) throw new Error('Blank strings should be left out.');
if (ruView.fieldsValues.has('has_dormitory')) throw new Error('Non-boolean values of boolean fields should be left out.');
if (ruView.fieldsValues.get('education_form')?.value !== 'exchange') throw new Error('Unknown choice codes show as-is.');
if (ruView.fieldsValues.get('education_form')?.displayName !== 'Форма обучения') {
  throw new Error(`Field labels should be localized, got ${ruView.fieldsValues.get('education_form')?.displayName}.`);
}
if (ruView.sectionsValues.has('statistics')) throw new Error('Hidden sections should be left out.');
if (describeContent(ruView.sectionsValues.get('personal_info')?.value ?? null) !== 'text:Likes **proofs**.') {
  throw new Error('The record body should fill the body section.');
}

// ============================================================================
// Other roles
// ============================================================================

const teacher: PortalUser = {
  username: 'test.teacher',
  firstName: 'Test',
  lastName: 'Teacher',
  role: 'teacher',
  email: 'test.teacher@example.test',
  profile: {
    department: { name: 'Computer Science' },
    position: 'docent',
    hire_date: '2015-09-01',
    publications: [{ name: 'On graphs' }, { title: 'untitled' }],
  },
};
const teacherView = composeProfileView({
  user: teacher,
  display: resolveRoleDisplay(catalog, defaults, 'teacher'),
  locale: 'en',
  messages,
});
if (teacherView.fieldsValues.get('hire_date')?.value !== 'September 1, 2015') throw new Error('Date fields should be formatted.');
if (teacherView.fieldsValues.get('position')?.value !== 'Associate professor') throw new Error('Teacher position label expected.');
if (describeContent(teacherView.sectionsValues.get('publications')?.value ?? null) !== 'list:On graphs') {
  throw new Error('List records without a name should be dropped.');
}

const admin: PortalUser = {
  username: 'test.admin',
  firstName: 'Test',
  lastName: 'Admin',
  role: 'admin',
  email: 'test.admin@example.test',
  profile: { access_level: 5, responsibility_area: 'Timetables' },
};
const adminView = composeProfileView({
  user: admin,
  display: resolveRoleDisplay(catalog, defaults, 'admin'),
  locale: 'en',
  messages,
});
if (adminView.fieldsValues.get('access_level')?.value !== 'Full') throw new Error('Numeric choice codes should resolve.');

let mismatch = '';
try {
  composeProfileView({ user: makeStudent(), display: resolveRoleDisplay(catalog, defaults, 'teacher'), locale: 'en', messages });
} catch (err) {
  mismatch = err instanceof Error ? err.message : String(err);
}
if (mismatch !== 'Display settings for teacher cannot render a student profile (test.student)') {
  throw new Error(`Role mismatch should be rejected, got "${mismatch}".`);
}

console.log('composer test passed.');
