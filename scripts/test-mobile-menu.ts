#!/usr/bin/env node
import { createMobileMenuController } from '../src/main/mobileMenu';
import { FakeElement } from './fakeDom';

const nav = new FakeElement({ id: 'site-nav' });
const openButton = new FakeElement({ id: 'mobile-menu-open' });
const closeButton = new FakeElement({ id: 'mobile-menu-close' });

const menu = createMobileMenuController({ nav, openButton, closeButton });

if (menu.isOpen() || nav.classList.contains('active')) {
  throw new Error('Menu should start closed.');
}

openButton.click();
openButton.click();
if (!menu.isOpen() || !nav.classList.contains('active')) {
  throw new Error('Opening twice should leave the menu open.');
}

closeButton.click();
closeButton.click();
if (menu.isOpen() || nav.classList.contains('active')) {
  throw new Error('Closing twice should leave the menu closed.');
}

menu.open();
if (!nav.classList.contains('active')) throw new Error('open() should set the active class.');
menu.close();
if (nav.classList.contains('active')) throw new Error('close() should clear the active class.');

// A drawer rendered open is closed on init.
const openNav = new FakeElement({ id: 'site-nav', classes: ['active'] });
createMobileMenuController({ nav: openNav, openButton: new FakeElement(), closeButton: new FakeElement() });
if (openNav.classList.contains('active')) throw new Error('Controller should render the closed state on init.');

console.log('mobile menu test passed.');
