/**
 * Profile tab controller.
 *
 * Markup contract shared with the server renderer: a tab carries
 * `data-tab="<id>"`, its panel has `id="<id>-content"`. Which tab is active
 * lives in a single selection value; element flags are re-derived from it on
 * every change and never mutated anywhere else.
 */

export const INFO_TAB_ID = 'info';
export const PANEL_ID_SUFFIX = '-content';

export type TabId = string;

export type TabSelection = { readonly active: TabId };

export type TabView = {
  activeTab: TabId;
  visiblePanel: string | null;
};

type ClassFlags = { toggle(token: string, force?: boolean): boolean };

export type TabElement = {
  dataset: DOMStringMap;
  classList: ClassFlags;
  addEventListener(type: 'click', listener: () => void): void;
};

export type PanelElement = {
  id: string;
  classList: ClassFlags;
};

export function panelIdForTab(tabId: TabId): string {
  return `${tabId}${PANEL_ID_SUFFIX}`;
}

export function deriveTabView(selection: TabSelection, panelIds: ReadonlySet<string>): TabView {
  const panelId = panelIdForTab(selection.active);
  return {
    activeTab: selection.active,
    visiblePanel: panelIds.has(panelId) ? panelId : null,
  };
}

/** Tabs whose panel is missing from the markup. */
export function findOrphanTabs(tabIds: readonly TabId[], panelIds: Iterable<string>): TabId[] {
  const panels = new Set(panelIds);
  return tabIds.filter(id => !panels.has(panelIdForTab(id)));
}

type TabControllerDeps = {
  tabs: readonly TabElement[];
  panels: readonly PanelElement[];
};

export function createTabController({ tabs, panels }: TabControllerDeps) {
  const tabIds = tabs.map(tab => tab.dataset.tab ?? '');
  const panelIds = new Set(panels.map(panel => panel.id));

  let selection: TabSelection | null = tabIds.length ? { active: tabIds[0] } : null;

  function render() {
    if (!selection) return;
    const view = deriveTabView(selection, panelIds);

    tabs.forEach((tab, i) => {
      tab.classList.toggle('active', tabIds[i] === view.activeTab);
    });
    for (const panel of panels) {
      panel.classList.toggle('hidden', panel.id !== view.visiblePanel);
    }
  }

  function select(tab: TabId) {
    selection = { active: tab };
    render();
  }

  tabs.forEach((tab, i) => {
    tab.addEventListener('click', () => select(tabIds[i]));
  });

  render();

  return {
    select,
    getSelection: (): TabSelection | null => selection,
  };
}
