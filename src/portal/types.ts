export type UserRole = 'admin' | 'teacher' | 'student' | 'methodist' | 'dean';

export const USER_ROLES: UserRole[] = ['admin', 'teacher', 'student', 'methodist', 'dean'];

export function isUserRole(value: string): value is UserRole {
  return (USER_ROLES as readonly string[]).includes(value);
}

export type Locale = 'en' | 'ru';

export const LOCALES: Locale[] = ['en', 'ru'];

export function isLocale(value: string): value is Locale {
  return (LOCALES as readonly string[]).includes(value);
}

/** Text carried in every supported locale; `en` is the fallback. */
export type LocalizedText = { en: string } & Partial<Record<Locale, string>>;

export function pickLocalized(text: LocalizedText, locale: Locale): string {
  return text[locale] ?? text.en;
}

// Role-specific profile data as it comes out of a user record (front matter).
export type ProfileAttributeValue =
  | string
  | number
  | boolean
  | null
  | ProfileAttributeValue[]
  | ProfileAttributes;

export interface ProfileAttributes {
  [key: string]: ProfileAttributeValue;
}

export interface PortalUser {
  username: string;
  firstName: string;
  lastName: string;
  patronymic?: string;
  role: UserRole;
  email: string;
  phoneNumber?: string;
  dateOfBirth?: string; // YYYY-MM-DD
  profilePictureUrl?: string;
  about?: string; // Markdown body of the record
  profile: ProfileAttributes;
}

export interface SiteSettings {
  siteName: string;
  siteDescription: string;
  siteKeywords: string;
  siteLogo: string | null;
  siteFavicon: string | null;
  footerText: string;
  contactEmail: string;
  contactPhone: string;
  primaryColor: string;
  secondaryColor: string;
  maintenanceMode: boolean;
}

export type FlashLevel = 'success' | 'info' | 'warning' | 'error';

export type FlashMessage = { level: FlashLevel; text: string };

// ============================================================================
// Composed profile view
// ============================================================================

export type FieldValue = {
  displayName: string;
  value: string | number | boolean;
  isBoolean: boolean;
};

export type StatEntry = { label: string; value: string };

export type SectionContent =
  | { kind: 'text'; markdown: string }
  | { kind: 'list'; items: string[] }
  | { kind: 'stats'; stats: StatEntry[] };

export type SectionValue = {
  displayName: string;
  value: SectionContent | null;
};

export type ProfileView = {
  user: PortalUser;
  roleDisplay: string;
  fieldsValues: ReadonlyMap<string, FieldValue>;
  sectionsValues: ReadonlyMap<string, SectionValue>;
  showStatistics: boolean;
};
