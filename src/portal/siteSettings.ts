import type { SiteSettings } from './types';
import { expectRecord, readOptionalBoolean, readOptionalString } from './validate';

export const DEFAULT_FAVICON_URL = '/static/img/favicon.ico';

export const DEFAULT_SITE_SETTINGS: SiteSettings = {
  siteName: 'EduPortal',
  siteDescription: '',
  siteKeywords: '',
  siteLogo: null,
  siteFavicon: null,
  footerText: '',
  contactEmail: '',
  contactPhone: '',
  primaryColor: '#3498db',
  secondaryColor: '#2ecc71',
  maintenanceMode: false,
};

const HEX_COLOR = /^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/;
const RGB_COLOR = /^rgba?\(\s*\d{1,3}\s*,\s*\d{1,3}\s*,\s*\d{1,3}\s*(?:,\s*(?:0|1|0?\.\d+)\s*)?\)$/;

export function isCssColor(value: string): boolean {
  return HEX_COLOR.test(value) || RGB_COLOR.test(value);
}

function readColor(obj: Record<string, unknown>, key: string, fallback: string): string {
  const value = readOptionalString(obj, key, 'site');
  if (value === undefined) return fallback;
  const trimmed = value.trim();
  // Colors are written verbatim into a <style> block.
  if (!isCssColor(trimmed)) throw new Error(`site.${key} must be a hex or rgb() color, got "${value}"`);
  return trimmed;
}

/**
 * Validate the `site` block of the portal config. Missing keys take the
 * defaults of a freshly created settings record.
 */
export function parseSiteSettings(raw: unknown): SiteSettings {
  if (raw === undefined || raw === null) return { ...DEFAULT_SITE_SETTINGS };
  const obj = expectRecord(raw, 'site');
  const d = DEFAULT_SITE_SETTINGS;

  return {
    siteName: readOptionalString(obj, 'site_name', 'site') ?? d.siteName,
    siteDescription: readOptionalString(obj, 'site_description', 'site') ?? d.siteDescription,
    siteKeywords: readOptionalString(obj, 'site_keywords', 'site') ?? d.siteKeywords,
    siteLogo: readOptionalString(obj, 'site_logo', 'site') ?? d.siteLogo,
    siteFavicon: readOptionalString(obj, 'site_favicon', 'site') ?? d.siteFavicon,
    footerText: readOptionalString(obj, 'footer_text', 'site') ?? d.footerText,
    contactEmail: readOptionalString(obj, 'contact_email', 'site') ?? d.contactEmail,
    contactPhone: readOptionalString(obj, 'contact_phone', 'site') ?? d.contactPhone,
    primaryColor: readColor(obj, 'primary_color', d.primaryColor),
    secondaryColor: readColor(obj, 'secondary_color', d.secondaryColor),
    maintenanceMode: readOptionalBoolean(obj, 'maintenance_mode', 'site') ?? d.maintenanceMode,
  };
}

export function resolveFaviconUrl(settings: SiteSettings): string {
  return settings.siteFavicon ?? DEFAULT_FAVICON_URL;
}

export function renderCssVariables(settings: SiteSettings): string {
  return `:root { --primary-color: ${settings.primaryColor}; --secondary-color: ${settings.secondaryColor}; }`;
}
