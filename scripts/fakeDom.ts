// Minimal element stand-ins for controller tests; only what the controllers touch.

export class FakeClassList {
  private classes: Set<string>;

  constructor(initial: string[] = []) {
    this.classes = new Set(initial);
  }

  add(value: string) {
    this.classes.add(value);
  }

  remove(value: string) {
    this.classes.delete(value);
  }

  contains(value: string) {
    return this.classes.has(value);
  }

  toggle(value: string, force?: boolean) {
    const next = force ?? !this.classes.has(value);
    if (next) this.classes.add(value);
    else this.classes.delete(value);
    return next;
  }
}

export class FakeElement {
  id: string;
  dataset: DOMStringMap;
  classList: FakeClassList;
  removed = false;
  private clickListeners: Array<() => void> = [];

  constructor(options: { id?: string; dataset?: DOMStringMap; classes?: string[] } = {}) {
    this.id = options.id ?? '';
    this.dataset = options.dataset ?? {};
    this.classList = new FakeClassList(options.classes);
  }

  addEventListener(type: string, listener: () => void) {
    if (type === 'click') this.clickListeners.push(listener);
  }

  click() {
    for (const listener of this.clickListeners) listener();
  }

  remove() {
    this.removed = true;
  }
}

export function fakeTab(id: string, classes: string[] = []): FakeElement {
  return new FakeElement({ dataset: { tab: id }, classes });
}

export function fakePanel(id: string, classes: string[] = []): FakeElement {
  return new FakeElement({ id, classes });
}
