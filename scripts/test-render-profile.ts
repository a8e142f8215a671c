#!/usr/bin/env node
import { composeProfileView } from '../src/portal/composer';
import { parseProfileDisplay, resolveRoleDisplay } from '../src/portal/displaySettings';
import { findOrphanTabs } from '../src/main/profileTabs';
import { escapeHtml, fullName, initials, isSafeUrl, renderMarkdown } from '../src/portalView/formatting';
import { collectTabMarkup } from '../src/portalView/pages';
import { profileTabEntries, renderProfileDirectory, renderProfilePage } from '../src/portalView/renderProfile';
import { loadCatalog, loadMessages, makeStudent } from './testData';

const catalog = loadCatalog();
const messages = loadMessages();
const options = { locale: 'en' as const, messages };
const display = resolveRoleDisplay(catalog, parseProfileDisplay(undefined, catalog), 'student');

function expectIncludes(html: string, fragment: string, message: string) {
  if (!html.includes(fragment)) throw new Error(`${message}\nMissing: ${fragment}`);
}

// ============================================================================
// Formatting helpers
// ============================================================================

if (escapeHtml(`<a href="x">'&'</a>`) !== '&lt;a href=&quot;x&quot;&gt;&#039;&amp;&#039;&lt;/a&gt;') {
  throw new Error('escapeHtml should escape all five special characters.');
}
if (fullName({ lastName: 'Ivanova', firstName: 'Anna', patronymic: ' ' }) !== 'Ivanova Anna') {
  throw new Error('fullName should collapse blank parts.');
}
if (initials({ lastName: ' ivanova', firstName: 'anna' }) !== 'IA') throw new Error('initials should be uppercase.');
if (renderMarkdown('**bold**') !== '<p><strong>bold</strong></p>\n') throw new Error('Markdown should render.');

const markdownChecks: Array<[string, string]> = [
  ['Use `a < b` here', '<p>Use <code>a &lt; b</code> here</p>\n'],
  ['> quoted line', '<blockquote>\n<p>quoted line</p>\n</blockquote>\n'],
  ['Hi <b>there</b>', '<p>Hi &lt;b&gt;there&lt;/b&gt;</p>\n'],
  ['[site](https://example.test)', '<p><a href="https://example.test">site</a></p>\n'],
  ['[grades](/grades/)', '<p><a href="/grades/">grades</a></p>\n'],
  ['[click](javascript:alert(document.cookie))', '<p>click</p>\n'],
  ['[click](JavaScript:alert(1))', '<p>click</p>\n'],
  ['[away](//other.test/page)', '<p>away</p>\n'],
  ['![x](javascript:alert(1))', '<p>x</p>\n'],
  ['![pic](data:image/svg+xml,abc)', '<p>pic</p>\n'],
];
for (const [source, expected] of markdownChecks) {
  const actual = renderMarkdown(source);
  if (actual !== expected) throw new Error(`renderMarkdown(${source}) expected ${expected}, got ${actual}`);
}
const script = renderMarkdown('<script>alert(1)</script>');
if (script.trim() !== '&lt;script&gt;alert(1)&lt;/script&gt;') throw new Error(`Raw HTML blocks should render as text, got ${script}`);
if (!isSafeUrl('mailto:office@example.test') || !isSafeUrl('#info') || isSafeUrl('vbscript:x')) {
  throw new Error('isSafeUrl should allow web, mail and in-page URLs only.');
}

// ============================================================================
// Profile page
// ============================================================================

const view = composeProfileView({ user: makeStudent(), display, locale: 'en', messages });
const html = renderProfilePage(view, options);

const entries = profileTabEntries(view, options);
const ids = entries.map(entry => entry.id).join(',');
if (ids !== 'info,personal_info,skills,certificates,achievements,courses,activity,statistics') {
  throw new Error(`Unexpected tab order: ${ids}`);
}

const withoutStats = { ...view, showStatistics: false };
const statsOffIds = profileTabEntries(withoutStats, options).map(entry => entry.id).join(',');
if (statsOffIds !== 'info,personal_info,skills,certificates,achievements,courses,activity') {
  throw new Error(`The statistics tab should need showStatistics, got ${statsOffIds}`);
}
const statsOffHtml = renderProfilePage(withoutStats, options);
if (statsOffHtml.includes('data-tab="statistics"') || statsOffHtml.includes('id="statistics-content"')) {
  throw new Error('Neither the statistics tab nor its panel should render without showStatistics.');
}

expectIncludes(
  html,
  '<button type="button" class="profile-tab active" data-tab="info" role="tab">Information</button>',
  'The info tab should start active.',
);
expectIncludes(
  html,
  '<button type="button" class="profile-tab" data-tab="skills" role="tab">Skills</button>',
  'Section tabs should start inactive.',
);
expectIncludes(html, '<div class="profile-panel" id="info-content" role="tabpanel">', 'The info panel should start visible.');
expectIncludes(
  html,
  '<div class="profile-panel hidden" id="statistics-content" role="tabpanel">',
  'Section panels should start hidden.',
);

const { tabIds, panelIds } = collectTabMarkup(html);
if (tabIds.length !== 8 || panelIds.length !== 8) throw new Error('Every tab should have one panel.');
if (findOrphanTabs(tabIds, panelIds).length) throw new Error('Rendered tabs should all have panels.');

expectIncludes(
  html,
  `
      <div class="profile-field profile-field-has_dormitory">
        <span class="profile-field-label">Lives in a dormitory</span>
        <span class="profile-field-value">No</span>
      </div>`,
  'false booleans should render as "No".',
);
expectIncludes(
  html,
  '<div class="profile-field profile-field-group-specialization-name">',
  'Dotted keys should become class-safe names.',
);
expectIncludes(
  html,
  '<span class="profile-field-value">test.student@example.test</span>',
  'Email should always be shown.',
);
if (html.includes('profile-field-phone')) throw new Error('Absent phone numbers should be left out.');

expectIncludes(html, '<ul class="profile-list"><li>Algebra</li><li>Statistics</li></ul>', 'List sections should render items.');
expectIncludes(html, '<div class="profile-text"><p>Chess club</p>\n</div>', 'Text sections should render Markdown.');
expectIncludes(
  html,
  '<div class="profile-stats"><div class="profile-stat"><span class="profile-stat-value">4.5</span><span class="profile-stat-label">Average grade</span></div><div class="profile-stat"><span class="profile-stat-value">90%</span><span class="profile-stat-label">Attendance</span></div></div>',
  'Stats sections should render tiles.',
);
expectIncludes(html, '<p class="profile-empty">No information yet.</p>', 'Empty sections should show a placeholder.');
expectIncludes(html, '<span class="profile-initials">ST</span>', 'Users without a picture get initials.');
expectIncludes(html, '<h1 class="profile-name">Student Test</h1>', 'Full name should be shown.');
expectIncludes(html, '<div class="profile-role">Student</div>', 'Role should be shown.');
expectIncludes(
  html,
  '<button type="button" class="btn btn-print" data-print-page>Print</button>',
  'The print button should be rendered.',
);

// Extra fields: phone, birth date, picture, and a true boolean.
const detailed = composeProfileView({
  user: makeStudent({
    phoneNumber: '+10000000001',
    dateOfBirth: '2001-03-14',
    profilePictureUrl: '/media/profile_pictures/test.png',
    profile: { has_dormitory: true },
  }),
  display,
  locale: 'en',
  messages,
});
const detailedHtml = renderProfilePage(detailed, options);
expectIncludes(detailedHtml, '<span class="profile-field-value">+10000000001</span>', 'Phone should be shown.');
expectIncludes(detailedHtml, '<span class="profile-field-value">March 14, 2001</span>', 'Birth date should be formatted.');
expectIncludes(detailedHtml, '<span class="profile-field-value">Yes</span>', 'true booleans should render as "Yes".');
expectIncludes(
  detailedHtml,
  '<img class="profile-avatar-image" src="/media/profile_pictures/test.png" alt="Student Test">',
  'Profile pictures should be used when present.',
);

// ============================================================================
// Directory
// ============================================================================

const directory = renderProfileDirectory(
  [{ username: 'test.student', name: 'Student Test', roleDisplay: 'Student', href: '/profiles/test.student.html' }],
  options,
);
expectIncludes(
  directory,
  '<li class="directory-item"><a href="/profiles/test.student.html">Student Test</a> <span class="directory-role">Student</span></li>',
  'Directory entries should link to profiles.',
);
expectIncludes(directory, '<h1>Profiles</h1>', 'Directory title expected.');

console.log('render profile test passed.');
