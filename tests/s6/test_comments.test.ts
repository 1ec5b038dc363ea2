/**
 * S6: Comment carry-over
 */

import { describe, test, expect } from 'vitest';
import { scanComments, CommentTable } from '../../src/comments.js';
import { StatementTranslator } from '../../src/statement-translator.js';
import { TranslationContext, resolveOptions } from '../../src/context.js';
import { Syntax } from '../../src/syntax-builders.js';
import { transpile } from '../../src/transpile.js';

describe('S6: Scanner', () => {
  test('Standalone and trailing comments', () => {
    const table = scanComments('# header\nx = 1  # one\n    # indented\n');
    expect(table.size).toBe(3);
    expect(table.peek(1)).toEqual({ text: 'header', standalone: true });
    expect(table.peek(2)).toEqual({ text: 'one', standalone: false });
    expect(table.peek(3)).toEqual({ text: 'indented', standalone: true });
  });

  test('Hash signs inside strings are not comments', () => {
    const table = scanComments('a = "#1"\nb = \'#2\'  # real\n');
    expect(table.size).toBe(1);
    expect(table.peek(2)).toEqual({ text: 'real', standalone: false });
  });

  test('Triple-quoted strings may span lines', () => {
    const table = scanComments('"""\n# not a comment\n"""\nx = 1  # after\n');
    expect(table.peek(2)).toBeUndefined();
    expect(table.peek(4)).toEqual({ text: 'after', standalone: false });
  });

  test('Escaped quotes do not end a string', () => {
    const table = scanComments('s = "say \\"#hi\\""  # note\n');
    expect(table.size).toBe(1);
    expect(table.peek(1)?.text).toBe('note');
  });

  test('Empty comments are ignored', () => {
    expect(scanComments('#\nx = 1  #   \n').size).toBe(0);
  });
});

describe('S6: Comment table', () => {
  test('Trailing comments are taken once', () => {
    const table = scanComments('x = 1  # one\n');
    expect(table.takeTrailing(1)).toBe('one');
    expect(table.takeTrailing(1)).toBeUndefined();
  });

  test('Standalone comments are not trailing', () => {
    expect(scanComments('# note\n').takeTrailing(1)).toBeUndefined();
  });

  test('Standalone comments above a line come out in source order', () => {
    const table = scanComments('# first\n# second\nx = 1  # trailing\n# later\ny = 2\n');
    expect(table.takeStandaloneBefore(3)).toEqual(['first', 'second']);
    expect(table.takeStandaloneBefore(3)).toEqual([]);
    expect(table.takeStandaloneBefore(5)).toEqual(['later']);
    expect(table.takeTrailing(3)).toBe('trailing');
  });

  test('Empty table', () => {
    const table = new CommentTable();
    expect(table.size).toBe(0);
    expect(table.takeStandaloneBefore(100)).toEqual([]);
  });
});

describe('S6: Placement', () => {
  function translateWith(source: string, build: () => Parameters<StatementTranslator['translate']>[0]): string[] {
    const context = new TranslationContext(resolveOptions(), scanComments(source));
    return new StatementTranslator(context).translate(build(), 1, 'block').map(l => l.text);
  }

  test('Trailing comment follows the statement', () => {
    const lines = translateWith('\n    go()  # start\n', () => Syntax.Expr(Syntax.Call(Syntax.Name('go'), []), 2));
    expect(lines).toEqual(['    go(); // start']);
  });

  test('Standalone comment goes above at the statement indent', () => {
    const lines = translateWith('    # prepare\n    go()\n', () => Syntax.Expr(Syntax.Call(Syntax.Name('go'), []), 2));
    expect(lines).toEqual(['    // prepare', '    go();']);
  });

  test('Trailing comment on a statement that emits nothing gets its own line', () => {
    const lines = translateWith('    pass  # nothing yet\n', () => Syntax.Pass(1));
    expect(lines).toEqual(['    // nothing yet']);
  });

  test('Compound headers carry their trailing comment', () => {
    const source = 'while ready:  # spin\n    go()\n';
    const lines = translateWith(source, () =>
      Syntax.While(Syntax.Name('ready'), [Syntax.Expr(Syntax.Call(Syntax.Name('go'), []), 2)], 1)
    );
    expect(lines).toEqual(['    while (ready) { // spin', '        go();', '    }']);
  });

  test('Comments are left out when disabled', () => {
    const { code } = transpile('# hello\nx = f()  # there\n', { comments: false });
    expect(code).toBe('\n\nx = f();\n\nvoid setup() {}\n\nvoid loop() {}\n');
  });

  test('Comments on import lines are dropped', () => {
    const { code } = transpile('# libraries\nfrom Servo import Servo  # arm\narm = Servo()\n');
    expect(code.startsWith('#include "Servo.h"\n\n\nServo arm();\n')).toBe(true);
  });

  test('elif headers carry their comments', () => {
    const source = [
      'def loop():',
      '    if a:',
      '        x = 1',
      '    # otherwise',
      '    elif b:  # second',
      '        x = 2',
      ''
    ].join('\n');
    const loop = transpile(source).unit.functions.find(fn => fn.name === 'loop');
    expect(loop?.lines).toEqual([
      'void loop() {',
      '    if (a) {',
      '        x = 1;',
      '        // otherwise',
      '    } else if (b) { // second',
      '        x = 2;',
      '    }',
      '}'
    ]);
  });
});

describe('S6: Comments closing a block', () => {
  test('A comment after the last statement stays in the function', () => {
    const { unit } = transpile('def setup():\n    x = 1\n    # end of setup\nY = 5\n');
    expect(unit.macros).toEqual(['#define Y 5']);
    expect(unit.functions[0].lines).toEqual([
      'void setup() {',
      '    x = 1;',
      '    // end of setup',
      '}'
    ]);
  });

  test('A dedented comment belongs to what follows', () => {
    const { unit } = transpile('def setup():\n    x = 1\n# about Y\nY = 5\n');
    expect(unit.macros).toEqual(['// about Y', '#define Y 5']);
    expect(unit.functions[0].lines).toEqual(['void setup() {', '    x = 1;', '}']);
  });

  test('if and else bodies each keep their closing comments', () => {
    const source = [
      'def loop():',
      '    if a:',
      '        x = 1',
      '        # still a',
      '    else:',
      '        # fallback',
      '        y = 2',
      '        # done',
      ''
    ].join('\n');
    expect(transpile(source).unit.functions.find(fn => fn.name === 'loop')?.lines).toEqual([
      'void loop() {',
      '    if (a) {',
      '        x = 1;',
      '        // still a',
      '    } else {',
      '        // fallback',
      '        y = 2;',
      '        // done',
      '    }',
      '}'
    ]);
  });

  test('Loop bodies keep their closing comments', () => {
    const source = 'def loop():\n    for i in range(3):\n        blink(i)\n        # next pin\n    while ready:\n        poll()\n        # again\n';
    expect(transpile(source).unit.functions.find(fn => fn.name === 'loop')?.lines).toEqual([
      'void loop() {',
      '    for (int i = 0; i < 3; i++) {',
      '        blink(i);',
      '        // next pin',
      '    }',
      '    while (ready) {',
      '        poll();',
      '        // again',
      '    }',
      '}'
    ]);
  });

  test('A body holding only comments is not collapsed', () => {
    const { unit } = transpile('def setup():\n    pass\n    # wire up later\n');
    expect(unit.functions[0].lines).toEqual(['void setup() {', '    // wire up later', '}']);
  });

  test('Explicit block ends flush unclaimed comments', () => {
    const source = 'while ready:\n    poll()\n    # again\n';
    const context = new TranslationContext(resolveOptions(), scanComments(source));
    const node = Syntax.While(Syntax.Name('ready'), [Syntax.Expr(Syntax.Call(Syntax.Name('poll'), []), 2)], 1, 3);
    expect(new StatementTranslator(context).translate(node).map(l => l.text)).toEqual([
      'while (ready) {',
      '    poll();',
      '    // again',
      '}'
    ]);
  });
});

describe('S6: End to end', () => {
  test('Stepper sketch', () => {
    const source = [
      'from CheapStepper import CheapStepper',
      'from Arduino import *',
      '',
      '# Stepper on pins 8-11',
      'motor = CheapStepper(8, 9, 10, 11)',
      'SPEED = 15',
      '',
      'def setup():',
      '    motor.setRpm(SPEED)  # set speed',
      '',
      'def loop():',
      '    motor.moveCW(512)  # clockwise',
      '    time.sleep(1)',
      ''
    ].join('\n');

    expect(transpile(source).code).toBe([
      '#include "CheapStepper.h"',
      '',
      '#define SPEED 15',
      '',
      '// Stepper on pins 8-11',
      'CheapStepper motor(8, 9, 10, 11);',
      '',
      'void setup() {',
      '    motor.setRpm(SPEED); // set speed',
      '}',
      '',
      'void loop() {',
      '    motor.moveCW(512); // clockwise',
      '    delay(1000);',
      '}',
      ''
    ].join('\n'));
  });
});
