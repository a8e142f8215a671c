import { Marked } from 'marked';

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

// Relative to the site, in-page, or an explicit web/mail scheme.
const SAFE_URL = /^(?:https?:|mailto:|#|\/(?!\/))/i;

export function isSafeUrl(url: string): boolean {
  return SAFE_URL.test(url.trim());
}

const userMarkdown = new Marked({
  renderer: {
    html(html) {
      return escapeHtml(html);
    },
    link(href, _title, text) {
      return isSafeUrl(href) ? false : text;
    },
    image(href, _title, text) {
      return isSafeUrl(href) ? false : text;
    },
  },
});

/**
 * Render user-authored Markdown. Raw HTML is shown as text, and links or
 * images with any other URL scheme are reduced to their text.
 */
export function renderMarkdown(source: string): string {
  const html = userMarkdown.parse(source, { async: false });
  if (typeof html !== 'string') throw new Error('Markdown renderer returned a promise');
  return html;
}

export function fullName(parts: { lastName: string; firstName: string; patronymic?: string }): string {
  return [parts.lastName, parts.firstName, parts.patronymic ?? ''].join(' ').replace(/\s+/g, ' ').trim();
}

export function initials(parts: { lastName: string; firstName: string }): string {
  return `${parts.lastName.trim().charAt(0)}${parts.firstName.trim().charAt(0)}`.toUpperCase();
}
