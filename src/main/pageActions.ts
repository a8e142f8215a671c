type Clickable = {
  addEventListener(type: 'click', listener: () => void): void;
};

export type FlashMessageElements = {
  element: { remove(): void };
  dismissButton: Clickable | null;
};

export function bindFlashDismissal(messages: readonly FlashMessageElements[]) {
  for (const { element, dismissButton } of messages) {
    dismissButton?.addEventListener('click', () => element.remove());
  }
}

export function bindPrintButtons(buttons: readonly Clickable[], print: () => void) {
  for (const button of buttons) {
    button.addEventListener('click', () => print());
  }
}
