import { describe, expect, it } from 'vitest';

import { checkScript, hasErrors } from '../../src/script/checker.js';
import { createTestScript } from '../helpers/mocks.js';

function check(lines: string[]) {
  const { script, scan } = createTestScript(lines);
  return checkScript(script, scan);
}

describe('checkScript', () => {
  it('reports nothing for a valid script', () => {
    const diagnostics = check([
      '@gold=0',
      ':start',
      'You have @gold gold.',
      '^iHow much?:@gold',
      '!@gold>5:#rich:#start',
      ':rich',
      '?Again:#start',
      '?Quit:#end',
      ':end',
    ]);

    expect(diagnostics).toEqual([]);
    expect(hasErrors(diagnostics)).toBe(false);
  });

  it('reports malformed lines', () => {
    expect(check(['Fine', '?broken'])).toEqual([
      {
        kind: 'MalformedDirective',
        severity: 'error',
        index: 1,
        message: "choice must have a prompt and a label separated by one ':'",
      },
    ]);
  });

  it('reports missing goto, branch and choice targets', () => {
    const diagnostics = check(['#nowhere', '!1==1:#void', '?Go:#gone']);

    expect(diagnostics.map((d) => [d.index, d.kind, d.message])).toEqual([
      [0, 'MissingLabel', "Label 'nowhere' does not exist"],
      [1, 'MissingLabel', "Label 'void' does not exist"],
      [2, 'MissingLabel', "Label 'gone' does not exist"],
    ]);
  });

  it('reports undeclared references and targets', () => {
    const diagnostics = check([
      'Hi @who.',
      '!@hp<1:@dead=1',
      '^sName?:@name',
      '@score=@bonus+2',
    ]);

    expect(diagnostics.map((d) => [d.index, d.message])).toEqual([
      [0, 'Variable @who is not declared'],
      [1, 'Variable @hp is not declared'],
      [1, 'Variable @dead is assigned but never declared'],
      [2, 'Variable @name is assigned but never declared'],
      [3, 'Variable @bonus is not declared'],
    ]);
    expect(hasErrors(diagnostics)).toBe(true);
  });

  it('reports broken branches', () => {
    expect(check(['!1==2:', '@a=1', '!1==1:ok:@a=1=2'])).toEqual([
      {
        kind: 'MalformedDirective',
        severity: 'error',
        index: 0,
        message: 'branch text is empty',
      },
      {
        kind: 'MalformedDirective',
        severity: 'error',
        index: 2,
        message: "assignment '@a=1=2' must contain exactly one '='",
      },
    ]);
  });

  it('does not check printed branch text', () => {
    expect(check(['!1==1:Hello @nobody'])).toEqual([]);
  });

  it('includes scan warnings in line order', () => {
    const diagnostics = check([':a', '#missing', ':a']);

    expect(diagnostics.map((d) => [d.index, d.severity, d.kind])).toEqual([
      [1, 'error', 'MissingLabel'],
      [2, 'warning', 'DuplicateLabel'],
    ]);
    expect(hasErrors(diagnostics)).toBe(true);
  });
});
