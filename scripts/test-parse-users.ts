#!/usr/bin/env node
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadUsers, parseUserRecord } from './parse-users';
import { repoPath } from './testData';

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

function record(frontMatter: string, body = ''): string {
  return `---\n${frontMatter}\n---\n${body}`;
}

const BASE = 'first_name: Test\nlast_name: User\nemail: test.user@example.test';

// ============================================================================
// Single records
// ============================================================================

const user = parseUserRecord(
  record(
    `${BASE}\nrole: teacher\npatronymic: Testovich\ndate_of_birth: 1980-02-29\nprofile:\n  hire_date: 2010-09-01\n  department:\n    name: Physics\n  publications:\n    - name: Paper one`,
    '\nLikes *optics*.\n\n',
  ),
  'x.teacher.md',
);

if (user.username !== 'x.teacher') throw new Error(`Username should default to the file name, got ${user.username}.`);
if (user.role !== 'teacher' || user.patronymic !== 'Testovich') throw new Error('Account fields should be read.');
if (user.dateOfBirth !== '1980-02-29') throw new Error(`Bare YAML dates should become ISO dates, got ${user.dateOfBirth}.`);
if (user.profile.hire_date !== '2010-09-01') throw new Error('Nested dates should become ISO dates.');
if (user.about !== 'Likes *optics*.') throw new Error(`The trimmed body should become about, got ${user.about}.`);
if (user.phoneNumber !== undefined || user.profilePictureUrl !== undefined) {
  throw new Error('Absent optional fields should be undefined.');
}
const department = user.profile.department;
if (!department || typeof department !== 'object' || Array.isArray(department) || department.name !== 'Physics') {
  throw new Error('Nested profile records should be kept.');
}

const bare = parseUserRecord(record(`${BASE}\nusername: test.bare\nrole: dean`, '   \n'), 'whatever.md');
if (bare.username !== 'test.bare') throw new Error('An explicit username should win over the file name.');
if (bare.about !== undefined) throw new Error('A blank body should leave about unset.');
if (Object.keys(bare.profile).length !== 0) throw new Error('A missing profile should be empty.');

expectThrows(() => parseUserRecord(record(`${BASE}\nusername: ../etc\nrole: student`), 'bad.md'), 'bad.md: invalid username "../etc"');
expectThrows(() => parseUserRecord(record(`${BASE}\nrole: janitor`), 'r.md'), 'r.md: unknown role "janitor"');
expectThrows(() => parseUserRecord(record('first_name: Test\nlast_name: User\nrole: admin'), 'e.md'), 'e.md.email must be a string');
expectThrows(
  () => parseUserRecord(record(`${BASE}\nrole: admin\ndate_of_birth: "14.03.2001"`), 'd.md'),
  'd.md.date_of_birth must be a YYYY-MM-DD date',
);
expectThrows(() => parseUserRecord(record(`${BASE}\nrole: admin\nprofile: [1, 2]`), 'p.md'), 'p.md.profile must be an object');

// ============================================================================
// Directory loading
// ============================================================================

const samples = loadUsers(repoPath('data/users'));
const sampleNames = samples.map(u => `${u.role}:${u.username}`).join(',');
if (sampleNames !== 'admin:admin,dean:m.volkova,methodist:o.kuznetsova,student:a.petrova,teacher:i.sokolov') {
  throw new Error(`Unexpected sample users: ${sampleNames}`);
}
const student = samples.find(u => u.role === 'student');
if (!student || student.dateOfBirth !== '2004-05-17' || student.profile.has_dormitory !== false) {
  throw new Error('Sample student should parse fully.');
}

const dir = mkdtempSync(join(tmpdir(), 'portal-users-'));
try {
  writeFileSync(join(dir, 'a.md'), record(`${BASE}\nusername: one\nrole: student`));
  writeFileSync(join(dir, 'b.md'), record(`${BASE}\nusername: one\nrole: teacher`));
  writeFileSync(join(dir, 'c.md'), record(`${BASE}\nrole: janitor`));
  writeFileSync(join(dir, 'notes.txt'), 'not a record');

  const loaded = loadUsers(dir);
  if (loaded.length !== 1 || loaded[0].username !== 'one' || loaded[0].role !== 'student') {
    throw new Error('Duplicates and broken records should be skipped.');
  }
} finally {
  rmSync(dir, { recursive: true, force: true });
}

if (loadUsers(join(dir, 'missing')).length !== 0) throw new Error('A missing directory should yield no users.');

console.log('parse users test passed.');
