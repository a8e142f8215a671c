type MenuControl = {
  addEventListener(type: 'click', listener: () => void): void;
};

type MenuContainer = {
  classList: { toggle(token: string, force?: boolean): boolean };
};

type MobileMenuDeps = {
  nav: MenuContainer;
  openButton: MenuControl;
  closeButton: MenuControl;
};

export const MOBILE_MENU_ACTIVE_CLASS = 'active';

export function createMobileMenuController({ nav, openButton, closeButton }: MobileMenuDeps) {
  let isOpen = false;

  function render() {
    nav.classList.toggle(MOBILE_MENU_ACTIVE_CLASS, isOpen);
  }

  function open() {
    isOpen = true;
    render();
  }

  function close() {
    isOpen = false;
    render();
  }

  openButton.addEventListener('click', open);
  closeButton.addEventListener('click', close);
  render();

  return { open, close, isOpen: () => isOpen };
}
