import { readFileSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { parseFieldCatalog, type FieldCatalog } from '../src/portal/displaySettings';
import { parseLocaleTable, type LocaleTable } from '../src/portal/i18n';
import type { PortalUser } from '../src/portal/types';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export function repoPath(relativePath: string): string {
  return resolve(__dirname, '..', relativePath);
}

export function loadJson(relativePath: string): unknown {
  return JSON.parse(readFileSync(repoPath(relativePath), 'utf-8'));
}

export function loadCatalog(): FieldCatalog {
  return parseFieldCatalog(loadJson('data/profile-fields.v1.json'));
}

export function loadMessages(): LocaleTable {
  return parseLocaleTable(loadJson('data/locales.v1.json'));
}

export function makeStudent(overrides: Partial<PortalUser> = {}): PortalUser {
  return {
    username: 'test.student',
    firstName: 'Test',
    lastName: 'Student',
    role: 'student',
    email: 'test.student@example.test',
    profile: {
      student_id: 'ST-1',
      group: { name: 'G-1', specialization: { name: 'Mathematics', department: null } },
      education_form: 'full_time',
      education_basis: 'budget',
      enrollment_year: 2023,
      current_semester: 3,
      academic_status: 'active',
      scholarship_status: 'none',
      has_dormitory: false,
      skills: ['Algebra', { name: 'Statistics' }, '  '],
      courses: [],
      activity: 'Chess club',
      statistics: { 'Average grade': 4.5, Attendance: '90%' },
    },
    ...overrides,
  };
}
