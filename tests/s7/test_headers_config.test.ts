/**
 * S7: Header stubs and project configuration
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  generatePythonStub,
  parseClassDescriptions,
  loadClassDescriptions,
  constructibleNames
} from '../../src/header-stubs.js';
import { loadConfig, mergeOptions, CONFIG_FILE } from '../../src/config.js';
import { pythonTypeToCpp, cppTypeToPython } from '../../src/type-names.js';
import { CollaboratorError, ConfigError } from '../../src/errors.js';
import { transpile } from '../../src/transpile.js';

const STEPPER = [
  {
    name: 'CheapStepper',
    methods: [
      { name: 'CheapStepper', params: [] },
      {
        name: 'CheapStepper',
        params: [
          { name: 'in1', type: 'int' },
          { name: 'in2', type: 'int' },
          { name: 'in3', type: 'int' },
          { name: 'in4', type: 'int' }
        ]
      },
      { name: 'setRpm', params: [{ name: 'rpm', type: 'int' }] },
      { name: 'moveCW', params: [{ name: 'steps', type: 'long' }] },
      { name: 'moveCW', params: [] },
      { name: 'getDelay', params: [] }
    ]
  },
  { name: 'Marker' }
];

describe('S7: Type names', () => {
  test('Python annotations to C++', () => {
    expect(pythonTypeToCpp(undefined)).toBe('auto');
    expect(pythonTypeToCpp('int')).toBe('int');
    expect(pythonTypeToCpp('str')).toBe('String');
    expect(pythonTypeToCpp('None')).toBe('void');
    expect(pythonTypeToCpp('Servo')).toBe('Servo');
    expect(pythonTypeToCpp('constructor')).toBe('constructor');
  });

  test('C++ parameter types to Python', () => {
    expect(cppTypeToPython('unsigned int')).toBe('int');
    expect(cppTypeToPython(' uint8_t ')).toBe('int');
    expect(cppTypeToPython('double')).toBe('float');
    expect(cppTypeToPython('bool')).toBe('bool');
    expect(cppTypeToPython('char*')).toBe('str');
    expect(cppTypeToPython('Stream&')).toBe('Any');
  });
});

describe('S7: Header stubs', () => {
  test('Stub for an overloaded class', () => {
    expect(generatePythonStub(parseClassDescriptions(STEPPER))).toBe([
      'from typing import Any',
      '',
      'class CheapStepper:',
      '    def __init__(self, in1: int, in2: int, in3: int, in4: int):',
      '        ...',
      '    def setRpm(self, rpm: int):',
      '        ...',
      '    def moveCW(self, *args: Any):',
      '        ...',
      '    def getDelay(self):',
      '        ...',
      '',
      'class Marker:',
      '    pass',
      ''
    ].join('\n'));
  });

  test('Constructor with no arguments', () => {
    const stub = generatePythonStub([{ name: 'Led', methods: [{ name: 'Led', params: [] }] }]);
    expect(stub.split('\n')).toContain('    def __init__(self):');
  });

  test('Class names feed the constructible registry', () => {
    const names = constructibleNames(parseClassDescriptions(STEPPER));
    expect(names).toEqual(['CheapStepper', 'Marker']);
    expect(transpile('m = Marker()\n', { constructibleTypes: names }).unit.statements).toEqual(['Marker m();']);
  });

  test('Invalid descriptions raise a collaborator error', () => {
    try {
      parseClassDescriptions([{ name: '' }], 'stepper.json');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CollaboratorError);
      const collaborator = error as CollaboratorError;
      expect(collaborator.message).toBe('Invalid class description in stepper.json');
      expect(collaborator.collaborator).toBe('header-introspection');
      expect(collaborator.diagnostics.startsWith('0.name: ')).toBe(true);
    }
  });
});

describe('S7: Files', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'py2ino-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('Class descriptions load from JSON', () => {
    const file = path.join(dir, 'classes.json');
    fs.writeFileSync(file, JSON.stringify(STEPPER));
    expect(loadClassDescriptions(file).map(cls => cls.name)).toEqual(['CheapStepper', 'Marker']);
  });

  test('Unreadable or non-JSON descriptions raise a collaborator error', () => {
    expect(() => loadClassDescriptions(path.join(dir, 'missing.json'))).toThrow(CollaboratorError);
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{ nope');
    expect(() => loadClassDescriptions(file)).toThrow(CollaboratorError);
  });

  test('Missing config is empty', () => {
    expect(loadConfig(dir)).toEqual({});
  });

  test('Config is read and class paths resolved against the project', () => {
    fs.writeFileSync(
      path.join(dir, CONFIG_FILE),
      JSON.stringify({ autoLoop: true, constructibleTypes: ['Servo'], classes: 'lib/classes.json' })
    );
    expect(loadConfig(dir)).toEqual({
      autoLoop: true,
      constructibleTypes: ['Servo'],
      classes: path.resolve(dir, 'lib/classes.json')
    });
  });

  test('Unknown keys are rejected', () => {
    fs.writeFileSync(path.join(dir, CONFIG_FILE), JSON.stringify({ autoloop: true }));
    expect(() => loadConfig(dir)).toThrow(ConfigError);
  });

  test('Wrong value types are rejected', () => {
    fs.writeFileSync(path.join(dir, CONFIG_FILE), JSON.stringify({ comments: 'yes' }));
    try {
      loadConfig(dir);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect((error as ConfigError).path).toBe(path.join(dir, CONFIG_FILE));
      expect((error as ConfigError).message.startsWith('Invalid config: comments: ')).toBe(true);
    }
  });

  test('Broken JSON is a config error', () => {
    fs.writeFileSync(path.join(dir, CONFIG_FILE), '{');
    expect(() => loadConfig(dir)).toThrow(ConfigError);
  });
});

describe('S7: Option merging', () => {
  test('Flags win over config values', () => {
    const merged = mergeOptions({ autoLoop: true, comments: false }, { autoLoop: false });
    expect(merged.autoLoop).toBe(false);
    expect(merged.comments).toBe(false);
  });

  test('Constructible types from both sources are kept', () => {
    const merged = mergeOptions({ constructibleTypes: ['Servo'] }, { constructibleTypes: ['Wire'] });
    expect(merged.constructibleTypes).toEqual(['Servo', 'Wire']);
  });

  test('Merged options drive translation', () => {
    const merged = mergeOptions({ inferConstruction: true }, {});
    expect(transpile('led = Led(13)\n', merged).unit.statements).toEqual(['Led led(13);']);
  });
});
