import { roleMessageKey, translate, type LocaleTable, type MessageKey } from '../portal/i18n';
import { renderCssVariables, resolveFaviconUrl } from '../portal/siteSettings';
import type { FlashMessage, Locale, PortalUser, SiteSettings } from '../portal/types';
import { escapeHtml, fullName } from './formatting';

export type ShellAssets = {
  script: string;
  style: string | null;
};

export type PageShellInput = {
  settings: SiteSettings;
  messages: LocaleTable;
  locale: Locale;
  title: string;
  body: string;
  assets: ShellAssets;
  user?: PortalUser | null;
  flash?: readonly FlashMessage[];
  activeNav?: NavKey;
};

export type NavKey = 'dashboard' | 'schedule' | 'grades' | 'messages' | 'profile';

export const NAV_LINKS: ReadonlyArray<{ key: NavKey; href: string; label: MessageKey }> = [
  { key: 'dashboard', href: '/', label: 'nav.dashboard' },
  { key: 'schedule', href: '/schedule/', label: 'nav.schedule' },
  { key: 'grades', href: '/grades/', label: 'nav.grades' },
  { key: 'messages', href: '/messages/', label: 'nav.messages' },
  { key: 'profile', href: '/accounts/profile/', label: 'nav.profile' },
];

function renderBrand(settings: SiteSettings): string {
  const name = escapeHtml(settings.siteName);
  if (settings.siteLogo) {
    return `<a class="site-brand" href="/"><img class="site-logo" src="${escapeHtml(settings.siteLogo)}" alt="${name}"></a>`;
  }
  return `<a class="site-brand" href="/">${name}</a>`;
}

function renderNav(input: PageShellInput): string {
  const t = (key: MessageKey) => escapeHtml(translate(input.messages, input.locale, key));
  const links = NAV_LINKS.map(link => {
    const active = link.key === input.activeNav ? ' active' : '';
    return `
        <li><a class="site-nav-link${active}" href="${link.href}">${t(link.label)}</a></li>`;
  }).join('');

  return `
    <button type="button" class="mobile-menu-toggle" id="mobile-menu-open" aria-controls="site-nav" aria-label="${t('nav.openMenu')}">&#9776;</button>
    <nav class="site-nav" id="site-nav">
      <button type="button" class="mobile-menu-close" id="mobile-menu-close" aria-label="${t('nav.closeMenu')}">&times;</button>
      <ul class="site-nav-list">${links}
      </ul>
    </nav>`;
}

function renderUserMenu(input: PageShellInput): string {
  const { user } = input;
  if (!user) return '';
  const t = (key: MessageKey) => escapeHtml(translate(input.messages, input.locale, key));
  return `
    <div class="user-menu">
      <span class="user-menu-name">${escapeHtml(fullName(user))}</span>
      <span class="user-menu-role">${t(roleMessageKey(user.role))}</span>
      <a class="user-menu-link" href="/accounts/profile/">${t('nav.profile')}</a>
      <a class="user-menu-link" href="/accounts/logout/">${t('nav.logout')}</a>
    </div>`;
}

function renderFlash(input: PageShellInput): string {
  const flash = input.flash ?? [];
  if (!flash.length) return '';
  const dismiss = escapeHtml(translate(input.messages, input.locale, 'flash.dismiss'));
  const items = flash
    .map(message => `
      <div class="flash flash-${message.level}" data-flash-message role="status">
        <span class="flash-text">${escapeHtml(message.text)}</span>
        <button type="button" class="flash-dismiss" data-flash-dismiss aria-label="${dismiss}">&times;</button>
      </div>`)
    .join('');
  return `
  <div class="flash-messages">${items}
  </div>`;
}

function renderFooter(settings: SiteSettings, input: PageShellInput): string {
  const contacts = [settings.contactEmail, settings.contactPhone].filter(Boolean).map(escapeHtml).join(' · ');
  const contactLine = contacts
    ? `
    <div class="site-footer-contacts">${escapeHtml(translate(input.messages, input.locale, 'footer.contacts'))}: ${contacts}</div>`
    : '';
  const text = settings.footerText ? `
    <div class="site-footer-text">${escapeHtml(settings.footerText)}</div>` : '';
  return `
  <footer class="site-footer">${text}${contactLine}
  </footer>`;
}

export function renderPageShell(input: PageShellInput): string {
  const { settings } = input;
  const title = input.title ? `${input.title} | ${settings.siteName}` : settings.siteName;
  const maintenance = settings.maintenanceMode
    ? `
  <div class="maintenance-banner">${escapeHtml(translate(input.messages, input.locale, 'maintenance.banner'))}</div>`
    : '';
  const style = input.assets.style ? `
  <link rel="stylesheet" href="${escapeHtml(input.assets.style)}">` : '';

  return `<!DOCTYPE html>
<html lang="${input.locale}">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(title)}</title>
  <meta name="description" content="${escapeHtml(settings.siteDescription)}">
  <meta name="keywords" content="${escapeHtml(settings.siteKeywords)}">
  <link rel="icon" href="${escapeHtml(resolveFaviconUrl(settings))}">
  <style>${renderCssVariables(settings)}</style>${style}
  <script type="module" src="${escapeHtml(input.assets.script)}"></script>
</head>
<body>${maintenance}
  <header class="site-header">
    ${renderBrand(settings)}${renderNav(input)}${renderUserMenu(input)}
  </header>${renderFlash(input)}
  <main class="site-main">
${input.body}
  </main>${renderFooter(settings, input)}
</body>
</html>
`;
}
