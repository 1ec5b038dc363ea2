import * as fs from 'fs';
import { z } from 'zod/v4';
import { CollaboratorError } from './errors.js';
import { cppTypeToPython } from './type-names.js';

// Shape of the class listing a C++ header front-end hands over
const ParameterSchema = z.object({
  name: z.string(),
  type: z.string()
});

const MethodSchema = z.object({
  name: z.string(),
  params: z.array(ParameterSchema).default([])
});

const ClassSchema = z.object({
  name: z.string().min(1),
  methods: z.array(MethodSchema).default([])
});

const ClassListSchema = z.array(ClassSchema);

export type ParameterDescription = z.infer<typeof ParameterSchema>;
export type MethodDescription = z.infer<typeof MethodSchema>;
export type ClassDescription = z.infer<typeof ClassSchema>;

const COLLABORATOR = 'header-introspection';

export function parseClassDescriptions(json: unknown, origin = 'input'): ClassDescription[] {
  const parsed = ClassListSchema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.map(String).join('.') || '$'}: ${issue.message}`)
      .join('\n');
    throw new CollaboratorError(COLLABORATOR, `Invalid class description in ${origin}`, details);
  }
  return parsed.data;
}

export function loadClassDescriptions(file: string): ClassDescription[] {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf8');
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CollaboratorError(COLLABORATOR, `Cannot read class description ${file}`, message);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CollaboratorError(COLLABORATOR, `Class description ${file} is not JSON`, message);
  }

  return parseClassDescriptions(json, file);
}

/** Class names for the constructible-type registry */
export function constructibleNames(classes: ClassDescription[]): string[] {
  return classes.map(cls => cls.name);
}

function renderParams(params: ParameterDescription[]): string {
  return ['self', ...params.map(p => `${p.name}: ${cppTypeToPython(p.type)}`)].join(', ');
}

/**
 * Render Python stubs for library classes so sketches written against them
 * can be type-checked and autocompleted on the Python side.
 */
export function generatePythonStub(classes: ClassDescription[]): string {
  const lines: string[] = ['from typing import Any', ''];

  for (const cls of classes) {
    lines.push(`class ${cls.name}:`);

    const overloads = new Map<string, MethodDescription[]>();
    for (const method of cls.methods) {
      const group = overloads.get(method.name) ?? [];
      group.push(method);
      overloads.set(method.name, group);
    }

    for (const [name, group] of overloads) {
      if (name === cls.name) {
        const chosen = group.find(m => m.params.length > 0) ?? group[0];
        lines.push(`    def __init__(${renderParams(chosen.params)}):`, '        ...');
      } else if (group.length > 1) {
        lines.push(`    def ${name}(self, *args: Any):`, '        ...');
      } else {
        lines.push(`    def ${name}(${renderParams(group[0].params)}):`, '        ...');
      }
    }

    if (cls.methods.length === 0) {
      lines.push('    pass');
    }
    lines.push('');
  }

  return lines.join('\n');
}
