import { composeProfileView } from '../portal/composer';
import { resolveRoleDisplay, type FieldCatalog, type ProfileDisplay } from '../portal/displaySettings';
import { roleMessageKey, translate, type LocaleTable } from '../portal/i18n';
import type { FlashMessage, Locale, PortalUser, SiteSettings } from '../portal/types';
import { fullName } from './formatting';
import { renderProfileDirectory, renderProfilePage, type DirectoryEntry } from './renderProfile';
import { renderPageShell, type ShellAssets } from './renderShell';

export type PortalPageContext = {
  site: SiteSettings;
  profileDisplay: ProfileDisplay;
  catalog: FieldCatalog;
  messages: LocaleTable;
  locale: Locale;
  assets: ShellAssets;
  flash: readonly FlashMessage[];
};

export function profileHref(username: string): string {
  return `/profiles/${encodeURIComponent(username)}.html`;
}

/** Full profile document for `user`, viewed by that same user. */
export function renderUserProfileDocument(user: PortalUser, ctx: PortalPageContext): string {
  const view = composeProfileView({
    user,
    display: resolveRoleDisplay(ctx.catalog, ctx.profileDisplay, user.role),
    locale: ctx.locale,
    messages: ctx.messages,
  });
  const options = { locale: ctx.locale, messages: ctx.messages };

  return renderPageShell({
    settings: ctx.site,
    messages: ctx.messages,
    locale: ctx.locale,
    title: `${translate(ctx.messages, ctx.locale, 'profile.title')}: ${fullName(user)}`,
    body: renderProfilePage(view, options),
    assets: ctx.assets,
    user,
    flash: ctx.flash,
    activeNav: 'profile',
  });
}

export function renderDirectoryDocument(users: readonly PortalUser[], ctx: PortalPageContext): string {
  const options = { locale: ctx.locale, messages: ctx.messages };
  const entries: DirectoryEntry[] = users.map(user => ({
    username: user.username,
    name: fullName(user),
    roleDisplay: translate(ctx.messages, ctx.locale, roleMessageKey(user.role)),
    href: profileHref(user.username),
  }));

  return renderPageShell({
    settings: ctx.site,
    messages: ctx.messages,
    locale: ctx.locale,
    title: translate(ctx.messages, ctx.locale, 'directory.title'),
    body: renderProfileDirectory(entries, options),
    assets: ctx.assets,
    flash: ctx.flash,
    activeNav: 'dashboard',
  });
}

/** Tab ids (`data-tab`) and panel ids (`*-content` tab panels) found in rendered markup. */
export function collectTabMarkup(html: string): { tabIds: string[]; panelIds: string[] } {
  const tabIds = Array.from(html.matchAll(/data-tab="([^"]*)"/g), m => m[1]);
  const panelIds = Array.from(html.matchAll(/id="([^"]*-content)" role="tabpanel"/g), m => m[1]);
  return { tabIds, panelIds };
}
