#!/usr/bin/env node
import { DEFAULT_ASSETS, loadPortalConfig, parsePortalConfig } from './load-config';
import { loadCatalog, repoPath } from './testData';

const catalog = loadCatalog();

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

// Shipped config
const config = loadPortalConfig(repoPath('config/portal.yaml'), catalog);
if (config.locale !== 'en') throw new Error('Shipped config should use English.');
if (config.site.siteName !== 'EduPortal' || config.site.siteLogo !== null) throw new Error('Site block should be read.');
if (config.site.contactPhone !== '+10000000000') throw new Error('Quoted phone numbers should stay strings.');
if (config.profileDisplay.student.fields.student_id !== true) throw new Error('Display toggles should be read.');
if (config.assets.script !== '/assets/portal.js' || config.assets.style !== '/assets/portal.css') {
  throw new Error('Asset paths should be read.');
}
if (config.flash.length !== 1 || config.flash[0].level !== 'info' || config.flash[0].text !== 'Spring semester schedules are published.') {
  throw new Error('Flash messages should be read.');
}

// Empty config
const empty = parsePortalConfig('', catalog);
if (empty.locale !== 'en' || empty.flash.length !== 0) throw new Error('Empty config should use defaults.');
if (empty.assets.script !== DEFAULT_ASSETS.script || empty.assets.style !== DEFAULT_ASSETS.style) {
  throw new Error('Empty config should use default assets.');
}
if (empty.site.primaryColor !== '#3498db') throw new Error('Empty config should use default site settings.');
if (Object.keys(empty.profileDisplay.teacher.sections).length !== 0) throw new Error('No toggles by default.');

const devAssets = parsePortalConfig('locale: ru\nassets:\n  style: null\n', catalog);
if (devAssets.locale !== 'ru') throw new Error('Locale should be read.');
if (devAssets.assets.style !== null || devAssets.assets.script !== DEFAULT_ASSETS.script) {
  throw new Error('A null style should drop the stylesheet and keep the default script.');
}

const flash = parsePortalConfig('flash:\n  - level: warning\n    text: "  Exams move to June.  "\n', catalog);
if (flash.flash[0].level !== 'warning' || flash.flash[0].text !== 'Exams move to June.') {
  throw new Error('Flash text should be trimmed.');
}

expectThrows(() => parsePortalConfig('locale: de\n', catalog), 'config.locale "de" is not supported');
expectThrows(() => parsePortalConfig('flash: nope\n', catalog), 'flash must be a list');
expectThrows(
  () => parsePortalConfig('flash:\n  - level: loud\n    text: hi\n', catalog),
  'flash[0].level must be one of success, info, warning, error',
);
expectThrows(() => parsePortalConfig('flash:\n  - level: info\n    text: "  "\n', catalog), 'flash[0].text must be a non-empty string');
expectThrows(
  () => parsePortalConfig('profile_display:\n  student:\n    fields:\n      nope: true\n', catalog),
  'profile_display.student.fields.nope is not a student field',
);
expectThrows(() => parsePortalConfig('site:\n  primary_color: blue\n', catalog), 'site.primary_color must be a hex or rgb() color');
expectThrows(() => parsePortalConfig('- a\n- b\n', catalog), 'config must be an object');

console.log('load config test passed.');
