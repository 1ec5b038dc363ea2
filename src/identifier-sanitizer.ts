// C++ reserved words that are legal Python identifiers. `int`, `float` and
// `bool` are left out on purpose: as callees they are valid C++ casts.
const CPP_KEYWORDS = new Set([
  'alignas', 'alignof', 'asm', 'auto', 'case', 'catch', 'char', 'const',
  'const_cast', 'constexpr', 'decltype', 'default', 'delete', 'do', 'double',
  'dynamic_cast', 'enum', 'explicit', 'export', 'extern', 'friend', 'goto',
  'inline', 'long', 'mutable', 'namespace', 'new', 'noexcept', 'nullptr',
  'operator', 'private', 'protected', 'public', 'register', 'reinterpret_cast',
  'short', 'signed', 'sizeof', 'static', 'static_assert', 'static_cast',
  'struct', 'switch', 'template', 'this', 'thread_local', 'throw', 'typedef',
  'typeid', 'typename', 'union', 'unsigned', 'using', 'virtual', 'void',
  'volatile', 'wchar_t'
]);

export function sanitizeIdentifier(name: string): string {
  if (CPP_KEYWORDS.has(name)) {
    return `${name}_py`;
  }
  return name;
}
