#!/usr/bin/env node
import {
  createTabController,
  deriveTabView,
  findOrphanTabs,
  panelIdForTab,
} from '../src/main/profileTabs';
import { fakePanel, fakeTab, type FakeElement } from './fakeDom';

function visiblePanels(panels: FakeElement[]): string[] {
  return panels.filter(p => !p.classList.contains('hidden')).map(p => p.id);
}

function activeTabs(tabs: FakeElement[]): string[] {
  return tabs.filter(t => t.classList.contains('active')).map(t => t.dataset.tab ?? '');
}

// Scenario: info + courses, click courses.
{
  const tabs = [fakeTab('info', ['active']), fakeTab('courses')];
  const panels = [fakePanel('info-content'), fakePanel('courses-content', ['hidden'])];
  createTabController({ tabs, panels });

  tabs[1].click();

  if (panels[1].classList.contains('hidden')) throw new Error('courses-content should be visible after clicking courses.');
  if (!panels[0].classList.contains('hidden')) throw new Error('info-content should be hidden after clicking courses.');
  if (!tabs[1].classList.contains('active')) throw new Error('courses tab should be active.');
  if (tabs[0].classList.contains('active')) throw new Error('info tab should no longer be active.');
}

// Scenario: a tab with no panel shows nothing and does not throw.
{
  const tabs = [fakeTab('info'), fakeTab('ghost')];
  const panels = [fakePanel('info-content')];
  createTabController({ tabs, panels });

  tabs[1].click();

  if (visiblePanels(panels).length !== 0) throw new Error('No panel should be visible for a tab without a panel.');
  if (activeTabs(tabs).join(',') !== 'ghost') throw new Error('The ghost tab should still be the only active tab.');
}

// Initial render follows the first tab regardless of server-side flags.
{
  const tabs = [fakeTab('info'), fakeTab('bio', ['active'])];
  const panels = [fakePanel('info-content', ['hidden']), fakePanel('bio-content')];
  const controller = createTabController({ tabs, panels });

  if (controller.getSelection()?.active !== 'info') throw new Error('Initial selection should be the first tab.');
  if (visiblePanels(panels).join(',') !== 'info-content') throw new Error('Only info-content should be visible initially.');
  if (activeTabs(tabs).join(',') !== 'info') throw new Error('Only the info tab should be active initially.');
}

// Exactly one visible panel and one active tab, whichever tab is clicked, in any order.
{
  const ids = ['info', 'activity', 'achievements', 'courses', 'publications'];
  const tabs = ids.map(id => fakeTab(id));
  const panels = ids.map(id => fakePanel(panelIdForTab(id)));
  const controller = createTabController({ tabs, panels });

  const order = [3, 0, 4, 4, 1, 2, 0];
  for (const index of order) {
    tabs[index].click();
    if (controller.getSelection()?.active !== ids[index]) {
      throw new Error(`Clicking ${ids[index]} should select it.`);
    }
    const visible = visiblePanels(panels);
    if (visible.length !== 1 || visible[0] !== `${ids[index]}-content`) {
      throw new Error(`Clicking ${ids[index]} should leave only ${ids[index]}-content visible, got [${visible.join(', ')}].`);
    }
    const active = activeTabs(tabs);
    if (active.length !== 1 || active[0] !== ids[index]) {
      throw new Error(`Clicking ${ids[index]} should leave only that tab active, got [${active.join(', ')}].`);
    }
  }
}

// Programmatic select uses the same path as clicks.
{
  const tabs = [fakeTab('info'), fakeTab('bio')];
  const panels = [fakePanel('info-content'), fakePanel('bio-content')];
  const controller = createTabController({ tabs, panels });
  controller.select('bio');
  if (controller.getSelection()?.active !== 'bio') throw new Error('select() should update the selection.');
  if (visiblePanels(panels).join(',') !== 'bio-content') throw new Error('select() should show bio-content.');
}

// No tabs: nothing to select, nothing to hide.
{
  const panels = [fakePanel('info-content')];
  const controller = createTabController({ tabs: [], panels });
  if (controller.getSelection() !== null) throw new Error('Selection should be null without tabs.');
  if (panels[0].classList.contains('hidden')) throw new Error('Panels should be left alone without tabs.');
}

{
  const view = deriveTabView({ active: 'courses' }, new Set(['info-content', 'courses-content']));
  if (view.activeTab !== 'courses' || view.visiblePanel !== 'courses-content') {
    throw new Error('deriveTabView should map the selection to its panel.');
  }
  const missing = deriveTabView({ active: 'ghost' }, new Set(['info-content']));
  if (missing.activeTab !== 'ghost' || missing.visiblePanel !== null) {
    throw new Error('deriveTabView should report no visible panel for a missing panel.');
  }
}

{
  const orphans = findOrphanTabs(['info', 'ghost', 'courses'], ['info-content', 'courses-content', 'extra-content']);
  if (orphans.join(',') !== 'ghost') throw new Error(`findOrphanTabs should return [ghost], got [${orphans.join(', ')}].`);
}

console.log('profile tabs test passed.');
