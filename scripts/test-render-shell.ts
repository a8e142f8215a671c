#!/usr/bin/env node
import { parseProfileDisplay } from '../src/portal/displaySettings';
import { DEFAULT_SITE_SETTINGS } from '../src/portal/siteSettings';
import { collectTabMarkup, profileHref, renderDirectoryDocument, renderUserProfileDocument, type PortalPageContext } from '../src/portalView/pages';
import { renderPageShell } from '../src/portalView/renderShell';
import { loadCatalog, loadMessages, makeStudent } from './testData';

const catalog = loadCatalog();
const messages = loadMessages();

function expectIncludes(html: string, fragment: string, message: string) {
  if (!html.includes(fragment)) throw new Error(`${message}\nMissing: ${fragment}`);
}

const ctx: PortalPageContext = {
  site: { ...DEFAULT_SITE_SETTINGS, contactEmail: 'office@example.test', contactPhone: '+10000000000', footerText: 'Test faculty' },
  profileDisplay: parseProfileDisplay(undefined, catalog),
  catalog,
  messages,
  locale: 'en',
  assets: { script: '/assets/portal.js', style: '/assets/portal.css' },
  flash: [{ level: 'info', text: 'Schedules <updated>' }],
};

// ============================================================================
// Profile document
// ============================================================================

const doc = renderUserProfileDocument(makeStudent(), ctx);

expectIncludes(doc, '<html lang="en">', 'Document language should follow the locale.');
expectIncludes(doc, '<title>Profile: Student Test | EduPortal</title>', 'Title should name the user and the site.');
expectIncludes(doc, '<link rel="icon" href="/static/img/favicon.ico">', 'Favicon should fall back to the static asset.');
expectIncludes(
  doc,
  '<style>:root { --primary-color: #3498db; --secondary-color: #2ecc71; }</style>',
  'Theme colors should be exposed as CSS variables.',
);
expectIncludes(doc, '<link rel="stylesheet" href="/assets/portal.css">', 'Stylesheet should be linked.');
expectIncludes(doc, '<script type="module" src="/assets/portal.js"></script>', 'Portal script should be loaded.');
expectIncludes(
  doc,
  '<li><a class="site-nav-link active" href="/accounts/profile/">Profile</a></li>',
  'Profile nav link should be active.',
);
expectIncludes(doc, '<li><a class="site-nav-link" href="/">Dashboard</a></li>', 'Other nav links stay inactive.');
expectIncludes(
  doc,
  '<button type="button" class="mobile-menu-toggle" id="mobile-menu-open" aria-controls="site-nav" aria-label="Open menu">&#9776;</button>',
  'Mobile menu toggle should be rendered.',
);
expectIncludes(doc, '<nav class="site-nav" id="site-nav">', 'Site nav should carry its id.');
expectIncludes(doc, 'id="mobile-menu-close"', 'Mobile menu close button should be rendered.');
expectIncludes(doc, '<span class="user-menu-name">Student Test</span>', 'User menu should name the user.');
expectIncludes(doc, '<span class="user-menu-role">Student</span>', 'User menu should show the role.');
expectIncludes(doc, '<div class="flash flash-info" data-flash-message role="status">', 'Flash messages should be rendered.');
expectIncludes(doc, '<span class="flash-text">Schedules &lt;updated&gt;</span>', 'Flash text should be escaped.');
expectIncludes(doc, 'data-flash-dismiss aria-label="Dismiss"', 'Flash messages should be dismissible.');
expectIncludes(doc, '<div class="site-footer-text">Test faculty</div>', 'Footer text should be shown.');
expectIncludes(
  doc,
  '<div class="site-footer-contacts">Contacts: office@example.test · +10000000000</div>',
  'Footer contacts should be joined.',
);
if (doc.includes('maintenance-banner')) throw new Error('Maintenance banner should be off by default.');

const { tabIds, panelIds } = collectTabMarkup(doc);
if (tabIds[0] !== 'info' || panelIds[0] !== 'info-content') throw new Error('Profile document should carry the tab markup.');

// ============================================================================
// Directory document
// ============================================================================

const directory = renderDirectoryDocument([makeStudent()], { ...ctx, flash: [] });
expectIncludes(directory, '<title>Profiles | EduPortal</title>', 'Directory title expected.');
expectIncludes(directory, '<a href="/profiles/test.student.html">Student Test</a>', 'Directory should link profiles.');
expectIncludes(directory, '<li><a class="site-nav-link active" href="/">Dashboard</a></li>', 'Dashboard should be active.');
if (directory.includes('flash-messages')) throw new Error('No flash block without messages.');
if (directory.includes('user-menu')) throw new Error('Directory has no signed-in user.');
if (profileHref('a b') !== '/profiles/a%20b.html') throw new Error('profileHref should encode usernames.');

// ============================================================================
// Shell options
// ============================================================================

const bare = renderPageShell({
  settings: {
    ...DEFAULT_SITE_SETTINGS,
    siteLogo: '/media/site_settings/logo.png',
    siteFavicon: '/media/site_settings/icon.png',
    maintenanceMode: true,
  },
  messages,
  locale: 'ru',
  title: '',
  body: '<p>body</p>',
  assets: { script: '/assets/portal.js', style: null },
});

expectIncludes(bare, '<title>EduPortal</title>', 'An empty title should leave just the site name.');
expectIncludes(bare, '<html lang="ru">', 'Russian locale should set the document language.');
expectIncludes(
  bare,
  '<a class="site-brand" href="/"><img class="site-logo" src="/media/site_settings/logo.png" alt="EduPortal"></a>',
  'Site logo should replace the name.',
);
expectIncludes(bare, '<link rel="icon" href="/media/site_settings/icon.png">', 'Configured favicon should be used.');
expectIncludes(bare, '<div class="maintenance-banner">', 'Maintenance banner should show in maintenance mode.');
expectIncludes(bare, '<li><a class="site-nav-link" href="/schedule/">Расписание</a></li>', 'Nav labels should be localized.');
expectIncludes(bare, '<main class="site-main">\n<p>body</p>\n  </main>', 'Body should be placed in main.');
if (bare.includes('rel="stylesheet"')) throw new Error('No stylesheet link without a style asset.');
if (bare.includes('site-footer-contacts') || bare.includes('site-footer-text')) {
  throw new Error('Footer should be empty without text or contacts.');
}

console.log('render shell test passed.');
