#!/usr/bin/env node
import { mkdirSync, writeFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { parseFieldCatalog } from '../src/portal/displaySettings';
import { parseLocaleTable } from '../src/portal/i18n';
import { findOrphanTabs } from '../src/main/profileTabs';
import {
  collectTabMarkup,
  renderDirectoryDocument,
  renderUserProfileDocument,
  type PortalPageContext,
} from '../src/portalView/pages';
import { loadJsonFile, loadPortalConfig } from './load-config';
import { loadUsers } from './parse-users';

const ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '..');
const CONFIG_PATH = process.env.PORTAL_CONFIG ?? join(ROOT, 'config', 'portal.yaml');
const CATALOG_PATH = join(ROOT, 'data', 'profile-fields.v1.json');
const LOCALES_PATH = join(ROOT, 'data', 'locales.v1.json');
const USERS_DIR = process.env.PORTAL_USERS_DIR ?? join(ROOT, 'data', 'users');
const OUTPUT_DIR = join(ROOT, 'public', 'profiles');

function main() {
  const catalog = parseFieldCatalog(loadJsonFile(CATALOG_PATH));
  const messages = parseLocaleTable(loadJsonFile(LOCALES_PATH));
  const config = loadPortalConfig(CONFIG_PATH, catalog);
  console.log('⚙️  Loaded portal config →', CONFIG_PATH);

  const ctx: PortalPageContext = {
    site: config.site,
    profileDisplay: config.profileDisplay,
    catalog,
    messages,
    locale: config.locale,
    assets: config.assets,
    flash: config.flash,
  };

  const users = loadUsers(USERS_DIR);
  console.log(`👥 Loaded ${users.length} user records from ${USERS_DIR}`);

  mkdirSync(OUTPUT_DIR, { recursive: true });

  let orphanCount = 0;
  for (const user of users) {
    const html = renderUserProfileDocument(user, ctx);

    const { tabIds, panelIds } = collectTabMarkup(html);
    const orphans = findOrphanTabs(tabIds, panelIds);
    if (orphans.length) {
      orphanCount += orphans.length;
      console.warn(`⚠️  ${user.username}: tabs without a panel: ${orphans.join(', ')}`);
    }

    const outPath = join(OUTPUT_DIR, `${user.username}.html`);
    writeFileSync(outPath, html);
    console.log('📄 Rendered', outPath);
  }

  const indexPath = join(OUTPUT_DIR, 'index.html');
  writeFileSync(indexPath, renderDirectoryDocument(users, ctx));
  console.log('📄 Rendered', indexPath);

  if (orphanCount) {
    console.warn(`⚠️  ${orphanCount} orphan tab(s) found`);
  } else {
    console.log(`✅ Rendered ${users.length} profile pages`);
  }
}

main();
