#!/usr/bin/env node
import { bindFlashDismissal, bindPrintButtons } from '../src/main/pageActions';
import { FakeElement } from './fakeDom';

const first = { element: new FakeElement(), dismissButton: new FakeElement() };
const second = { element: new FakeElement(), dismissButton: new FakeElement() };
const noButton = { element: new FakeElement(), dismissButton: null };

bindFlashDismissal([first, second, noButton]);

second.dismissButton.click();
if (!second.element.removed) throw new Error('Dismissing a flash message should remove it.');
if (first.element.removed) throw new Error('Dismissing one flash message should leave the others.');
if (noButton.element.removed) throw new Error('A message without a dismiss button should stay.');

let printCalls = 0;
const printButton = new FakeElement();
bindPrintButtons([printButton], () => {
  printCalls += 1;
});

printButton.click();
printButton.click();
if (printCalls !== 2) throw new Error(`Print should run once per click, ran ${printCalls} times.`);

console.log('page actions test passed.');
