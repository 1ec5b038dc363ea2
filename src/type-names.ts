const PYTHON_TO_CPP = new Map<string, string>([
  ['int', 'int'],
  ['float', 'float'],
  ['bool', 'bool'],
  ['str', 'String'],
  ['None', 'void']
]);

const CPP_INTEGERS = new Set(['int', 'long', 'short', 'unsigned int', 'uint8_t']);
const CPP_FLOATS = new Set(['float', 'double']);

/** C++ type for a Python annotation; unannotated values become `auto` */
export function pythonTypeToCpp(annotation: string | undefined): string {
  if (annotation === undefined) return 'auto';
  return PYTHON_TO_CPP.get(annotation) ?? annotation;
}

/** Python stub type for a C++ parameter type */
export function cppTypeToPython(cppType: string): string {
  const type = cppType.trim();
  if (CPP_INTEGERS.has(type)) return 'int';
  if (CPP_FLOATS.has(type)) return 'float';
  if (type === 'bool') return 'bool';
  if (type === 'char*') return 'str';
  return 'Any';
}
