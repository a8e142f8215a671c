import { readFileSync } from 'fs';
import * as yaml from 'yaml';
import { parseProfileDisplay, type FieldCatalog, type ProfileDisplay } from '../src/portal/displaySettings';
import { parseSiteSettings } from '../src/portal/siteSettings';
import { isLocale, type FlashLevel, type FlashMessage, type Locale, type SiteSettings } from '../src/portal/types';
import { expectRecord, readOptionalString, type PlainRecord } from '../src/portal/validate';
import type { ShellAssets } from '../src/portalView/renderShell';

export type PortalConfig = {
  site: SiteSettings;
  profileDisplay: ProfileDisplay;
  locale: Locale;
  assets: ShellAssets;
  flash: FlashMessage[];
};

export const DEFAULT_ASSETS: ShellAssets = {
  script: '/assets/portal.js',
  style: '/assets/portal.css',
};

const FLASH_LEVELS: FlashLevel[] = ['success', 'info', 'warning', 'error'];

function isFlashLevel(value: unknown): value is FlashLevel {
  return typeof value === 'string' && (FLASH_LEVELS as readonly string[]).includes(value);
}

function parseAssets(raw: unknown): ShellAssets {
  if (raw === undefined || raw === null) return { ...DEFAULT_ASSETS };
  const obj = expectRecord(raw, 'assets');
  return {
    script: readOptionalString(obj, 'script', 'assets') ?? DEFAULT_ASSETS.script,
    // explicit null drops the stylesheet link (dev server injects CSS itself)
    style: obj.style === null ? null : readOptionalString(obj, 'style', 'assets') ?? DEFAULT_ASSETS.style,
  };
}

function parseFlash(raw: unknown): FlashMessage[] {
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) throw new Error('flash must be a list');
  return raw.map((entry: unknown, i: number) => {
    const obj = expectRecord(entry, `flash[${i}]`);
    const { level, text } = obj;
    if (!isFlashLevel(level)) throw new Error(`flash[${i}].level must be one of ${FLASH_LEVELS.join(', ')}`);
    if (typeof text !== 'string' || !text.trim()) throw new Error(`flash[${i}].text must be a non-empty string`);
    return { level, text: text.trim() };
  });
}

export function parsePortalConfig(source: string, catalog: FieldCatalog): PortalConfig {
  const raw: unknown = yaml.parse(source);
  const obj: PlainRecord = raw === undefined || raw === null ? {} : expectRecord(raw, 'config');

  const locale = readOptionalString(obj, 'locale', 'config') ?? 'en';
  if (!isLocale(locale)) throw new Error(`config.locale "${locale}" is not supported`);

  return {
    site: parseSiteSettings(obj.site),
    profileDisplay: parseProfileDisplay(obj.profile_display, catalog),
    locale,
    assets: parseAssets(obj.assets),
    flash: parseFlash(obj.flash),
  };
}

export function loadPortalConfig(path: string, catalog: FieldCatalog): PortalConfig {
  return parsePortalConfig(readFileSync(path, 'utf-8'), catalog);
}

export function loadJsonFile(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}
