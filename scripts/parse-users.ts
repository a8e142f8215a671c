import { readFileSync, readdirSync, existsSync } from 'fs';
import { basename, join } from 'path';
import matter from 'gray-matter';
import { isUserRole, type PortalUser, type ProfileAttributeValue, type ProfileAttributes } from '../src/portal/types';
import { expectRecord, isRecord, readOptionalString, readString, type PlainRecord } from '../src/portal/validate';

const USERNAME = /^[a-z0-9][a-z0-9_.-]*$/i;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function toIsoDate(value: Date): string {
  return value.toISOString().slice(0, 10);
}

// Front matter YAML turns bare dates into Date objects.
function toAttributeValue(value: unknown, context: string): ProfileAttributeValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) return toIsoDate(value);
  if (Array.isArray(value)) return value.map((item, i) => toAttributeValue(item, `${context}[${i}]`));
  if (isRecord(value)) return toAttributes(value, context);
  throw new Error(`${context} has an unsupported value`);
}

function toAttributes(obj: PlainRecord, context: string): ProfileAttributes {
  const out: ProfileAttributes = {};
  for (const [key, value] of Object.entries(obj)) {
    out[key] = toAttributeValue(value, `${context}.${key}`);
  }
  return out;
}

function readDate(obj: PlainRecord, key: string, context: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null || value === '') return undefined;
  if (value instanceof Date) return toIsoDate(value);
  if (typeof value === 'string' && ISO_DATE.test(value)) return value;
  throw new Error(`${context}.${key} must be a YYYY-MM-DD date`);
}

/**
 * Parse one user record: front matter holds the account and role profile,
 * the Markdown body is the free-form text of the role's body section.
 */
export function parseUserRecord(fileContent: string, fileName: string): PortalUser {
  const { data, content } = matter(fileContent);
  const fm = expectRecord(data, fileName);

  const username = readOptionalString(fm, 'username', fileName) ?? basename(fileName, '.md');
  if (!USERNAME.test(username)) throw new Error(`${fileName}: invalid username "${username}"`);

  const role = readString(fm, 'role', fileName);
  if (!isUserRole(role)) throw new Error(`${fileName}: unknown role "${role}"`);

  const profileRaw = fm.profile;
  const profile = profileRaw === undefined || profileRaw === null
    ? {}
    : toAttributes(expectRecord(profileRaw, `${fileName}.profile`), `${fileName}.profile`);

  const about = content.trim();

  return {
    username,
    firstName: readString(fm, 'first_name', fileName),
    lastName: readString(fm, 'last_name', fileName),
    patronymic: readOptionalString(fm, 'patronymic', fileName),
    role,
    email: readString(fm, 'email', fileName),
    phoneNumber: readOptionalString(fm, 'phone_number', fileName),
    dateOfBirth: readDate(fm, 'date_of_birth', fileName),
    profilePictureUrl: readOptionalString(fm, 'profile_picture', fileName),
    about: about || undefined,
    profile,
  };
}

/** Load every `*.md` record in `dir`, sorted by file name. Broken records are skipped with a warning. */
export function loadUsers(dir: string): PortalUser[] {
  if (!existsSync(dir)) {
    console.warn('⚠️  User records directory not found:', dir);
    return [];
  }

  const users: PortalUser[] = [];
  const seen = new Set<string>();
  const files = readdirSync(dir).filter(f => f.endsWith('.md')).sort();

  for (const file of files) {
    try {
      const user = parseUserRecord(readFileSync(join(dir, file), 'utf-8'), file);
      if (seen.has(user.username)) {
        console.warn(`⚠️  Skipping ${file}: duplicate username "${user.username}"`);
        continue;
      }
      seen.add(user.username);
      users.push(user);
    } catch (err) {
      console.warn(`⚠️  Skipping ${file}:`, err instanceof Error ? err.message : String(err));
    }
  }

  return users;
}
