import './style.css';
import { initializePortalDom } from './main/dom';
import { createMobileMenuController } from './main/mobileMenu';
import { bindFlashDismissal, bindPrintButtons } from './main/pageActions';
import { createTabController } from './main/profileTabs';

function boot() {
  const dom = initializePortalDom(document);

  if (dom.tabs.length) {
    createTabController({ tabs: dom.tabs, panels: dom.panels });
  }

  if (dom.nav && dom.menuOpen && dom.menuClose) {
    createMobileMenuController({ nav: dom.nav, openButton: dom.menuOpen, closeButton: dom.menuClose });
  }

  bindFlashDismissal(dom.flashMessages);
  bindPrintButtons(dom.printButtons, () => window.print());
}

if (document.readyState === 'loading') {
  document.addEventListener('DOMContentLoaded', boot);
} else {
  boot();
}
