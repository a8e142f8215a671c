import { STATISTICS_SECTION_KEY } from '../portal/displaySettings';
import { formatDate, translate, type LocaleTable } from '../portal/i18n';
import type { FieldValue, Locale, ProfileView, SectionContent } from '../portal/types';
import { INFO_TAB_ID, panelIdForTab } from '../main/profileTabs';
import { escapeHtml, fullName, initials, renderMarkdown } from './formatting';

export type ProfileRenderOptions = {
  locale: Locale;
  messages: LocaleTable;
};

type TabEntry = { id: string; label: string; body: string };

function renderFieldRow(label: string, value: string, extraClass = ''): string {
  return `
      <div class="profile-field${extraClass ? ` ${extraClass}` : ''}">
        <span class="profile-field-label">${escapeHtml(label)}</span>
        <span class="profile-field-value">${escapeHtml(value)}</span>
      </div>`;
}

function displayFieldValue(field: FieldValue, { locale, messages }: ProfileRenderOptions): string {
  if (field.isBoolean) {
    return translate(messages, locale, field.value === true ? 'common.yes' : 'common.no');
  }
  return String(field.value);
}

function renderInfoPanel(view: ProfileView, options: ProfileRenderOptions): string {
  const { user } = view;
  const { locale, messages } = options;
  const rows: string[] = [renderFieldRow(translate(messages, locale, 'profile.email'), user.email, 'profile-field-email')];

  if (user.phoneNumber) {
    rows.push(renderFieldRow(translate(messages, locale, 'profile.phone'), user.phoneNumber, 'profile-field-phone'));
  }
  if (user.dateOfBirth) {
    rows.push(
      renderFieldRow(
        translate(messages, locale, 'profile.dateOfBirth'),
        formatDate(user.dateOfBirth, locale),
        'profile-field-birth-date',
      ),
    );
  }
  for (const [key, field] of view.fieldsValues) {
    rows.push(
      renderFieldRow(field.displayName, displayFieldValue(field, options), `profile-field-${key.replace(/[^a-z0-9_-]+/gi, '-')}`),
    );
  }

  return `<div class="profile-fields">${rows.join('')}
    </div>`;
}

function renderSectionContent(content: SectionContent | null, options: ProfileRenderOptions): string {
  if (!content) {
    return `<p class="profile-empty">${escapeHtml(translate(options.messages, options.locale, 'profile.empty'))}</p>`;
  }
  switch (content.kind) {
    case 'text':
      return `<div class="profile-text">${renderMarkdown(content.markdown)}</div>`;
    case 'list':
      return `<ul class="profile-list">${content.items.map(item => `<li>${escapeHtml(item)}</li>`).join('')}</ul>`;
    case 'stats':
      return `<div class="profile-stats">${content.stats
        .map(
          stat => `<div class="profile-stat"><span class="profile-stat-value">${escapeHtml(stat.value)}</span><span class="profile-stat-label">${escapeHtml(stat.label)}</span></div>`,
        )
        .join('')}</div>`;
  }
}

/**
 * Tab list for a composed view: the fixed info tab, then one per section.
 * The statistics tab needs `showStatistics` as well as its section.
 */
export function profileTabEntries(view: ProfileView, options: ProfileRenderOptions): TabEntry[] {
  const tabs: TabEntry[] = [
    { id: INFO_TAB_ID, label: translate(options.messages, options.locale, 'profile.tabInfo'), body: renderInfoPanel(view, options) },
  ];
  for (const [key, section] of view.sectionsValues) {
    if (key === STATISTICS_SECTION_KEY && !view.showStatistics) continue;
    tabs.push({ id: key, label: section.displayName, body: renderSectionContent(section.value, options) });
  }
  return tabs;
}

function renderAvatar(view: ProfileView): string {
  const { user } = view;
  if (user.profilePictureUrl) {
    return `<img class="profile-avatar-image" src="${escapeHtml(user.profilePictureUrl)}" alt="${escapeHtml(fullName(user))}">`;
  }
  return `<span class="profile-initials">${escapeHtml(initials(user))}</span>`;
}

/**
 * Profile page body. Tabs and panels come from the same entry list, so every
 * `data-tab` has its `<id>-content` panel; only the first panel starts visible.
 */
export function renderProfilePage(view: ProfileView, options: ProfileRenderOptions): string {
  const entries = profileTabEntries(view, options);

  const tabButtons = entries
    .map((entry, i) => `
      <button type="button" class="profile-tab${i === 0 ? ' active' : ''}" data-tab="${escapeHtml(entry.id)}" role="tab">${escapeHtml(entry.label)}</button>`)
    .join('');

  const panels = entries
    .map((entry, i) => `
      <div class="profile-panel${i === 0 ? '' : ' hidden'}" id="${escapeHtml(panelIdForTab(entry.id))}" role="tabpanel">
        ${entry.body}
      </div>`)
    .join('');

  return `
<section class="profile" data-role="${escapeHtml(view.user.role)}">
  <div class="profile-card">
    <div class="profile-avatar">${renderAvatar(view)}</div>
    <div class="profile-heading">
      <h1 class="profile-name">${escapeHtml(fullName(view.user))}</h1>
      <div class="profile-role">${escapeHtml(view.roleDisplay)}</div>
    </div>
    <button type="button" class="btn btn-print" data-print-page>${escapeHtml(translate(options.messages, options.locale, 'profile.print'))}</button>
  </div>
  <nav class="profile-tabs" role="tablist">${tabButtons}
  </nav>
  <div class="profile-panels">${panels}
  </div>
</section>
`;
}

export type DirectoryEntry = { username: string; name: string; roleDisplay: string; href: string };

export function renderProfileDirectory(entries: DirectoryEntry[], options: ProfileRenderOptions): string {
  const items = entries
    .map(entry => `
    <li class="directory-item"><a href="${escapeHtml(entry.href)}">${escapeHtml(entry.name)}</a> <span class="directory-role">${escapeHtml(entry.roleDisplay)}</span></li>`)
    .join('');
  return `
<section class="directory">
  <h1>${escapeHtml(translate(options.messages, options.locale, 'directory.title'))}</h1>
  <ul class="directory-list">${items}
  </ul>
</section>
`;
}
