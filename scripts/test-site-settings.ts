#!/usr/bin/env node
import {
  DEFAULT_FAVICON_URL,
  isCssColor,
  parseSiteSettings,
  renderCssVariables,
  resolveFaviconUrl,
} from '../src/portal/siteSettings';

function expectThrows(fn: () => unknown, fragment: string) {
  try {
    fn();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (!message.includes(fragment)) throw new Error(`Expected error containing "${fragment}", got "${message}".`);
    return;
  }
  throw new Error(`Expected an error containing "${fragment}".`);
}

const defaults = parseSiteSettings(undefined);
if (defaults.siteName !== 'EduPortal') throw new Error('Default site name should be EduPortal.');
if (defaults.primaryColor !== '#3498db' || defaults.secondaryColor !== '#2ecc71') {
  throw new Error('Default colors should match the settings record defaults.');
}
if (defaults.siteFavicon !== null || defaults.maintenanceMode !== false) {
  throw new Error('Favicon should default to null and maintenance mode to false.');
}

const custom = parseSiteSettings({
  site_name: 'Campus',
  primary_color: ' #112233 ',
  secondary_color: 'rgb(10, 20, 30)',
  site_favicon: '/media/site_settings/icon.png',
  site_logo: '',
  maintenance_mode: true,
});

if (custom.siteName !== 'Campus') throw new Error('site_name should be read.');
if (custom.primaryColor !== '#112233') throw new Error(`primary_color should be trimmed, got "${custom.primaryColor}".`);
if (custom.secondaryColor !== 'rgb(10, 20, 30)') throw new Error('rgb() colors should be accepted.');
if (custom.siteLogo !== null) throw new Error('An empty site_logo should count as unset.');
if (!custom.maintenanceMode) throw new Error('maintenance_mode should be read.');

if (resolveFaviconUrl(custom) !== '/media/site_settings/icon.png') throw new Error('Configured favicon should be used.');
if (resolveFaviconUrl(defaults) !== DEFAULT_FAVICON_URL) throw new Error('Favicon should fall back to the static asset.');

const css = renderCssVariables(custom);
if (css !== ':root { --primary-color: #112233; --secondary-color: rgb(10, 20, 30); }') {
  throw new Error(`Unexpected CSS variables: ${css}`);
}

for (const good of ['#abc', '#A1B2C3', 'rgba(1,2,3,0.5)']) {
  if (!isCssColor(good)) throw new Error(`${good} should be a valid color.`);
}
for (const bad of ['red', '#12345', 'rgb(1,2)', '#fff; } body { display:none']) {
  if (isCssColor(bad)) throw new Error(`${bad} should be rejected.`);
}

expectThrows(() => parseSiteSettings({ primary_color: 'blue' }), 'site.primary_color');
expectThrows(() => parseSiteSettings({ site_name: 42 }), 'site.site_name must be a string');
expectThrows(() => parseSiteSettings({ maintenance_mode: 'yes' }), 'site.maintenance_mode must be a boolean');
expectThrows(() => parseSiteSettings(['not', 'an', 'object']), 'site must be an object');

console.log('site settings test passed.');
