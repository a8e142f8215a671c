import type { FlashMessageElements } from './pageActions';

export type PortalDom = {
  tabs: HTMLElement[];
  panels: HTMLElement[];
  nav: HTMLElement | null;
  menuOpen: HTMLElement | null;
  menuClose: HTMLElement | null;
  flashMessages: FlashMessageElements[];
  printButtons: HTMLElement[];
};

export function initializePortalDom(doc: Document = document): PortalDom {
  const tabs = Array.from(doc.querySelectorAll<HTMLElement>('[data-tab]'));
  const panels = Array.from(doc.querySelectorAll<HTMLElement>('[role="tabpanel"][id$="-content"]'));

  const nav = doc.getElementById('site-nav');
  const menuOpen = doc.getElementById('mobile-menu-open');
  const menuClose = doc.getElementById('mobile-menu-close');

  const flashMessages = Array.from(doc.querySelectorAll<HTMLElement>('[data-flash-message]')).map(element => ({
    element,
    dismissButton: element.querySelector<HTMLElement>('[data-flash-dismiss]'),
  }));

  const printButtons = Array.from(doc.querySelectorAll<HTMLElement>('[data-print-page]'));

  return { tabs, panels, nav, menuOpen, menuClose, flashMessages, printButtons };
}
