export type YamlValue = string | boolean | string[];
export type YamlSection = Record<string, YamlValue>;

function unquote(value: string): string {
  if (value.length >= 2
    && ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))) {
    return value.slice(1, -1);
  }
  return value;
}

function parseValue(raw: string): YamlValue {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (raw.startsWith('[') && raw.endsWith(']')) {
    const inner = raw.slice(1, -1).trim();
    return inner === '' ? [] : inner.split(',').map((item) => unquote(item.trim()));
  }
  return unquote(raw);
}

/**
 * Minimal YAML parser for the flat config files under config/.
 *
 * Handles only the subset those files use: top-level section keys with
 * indented scalar values, inline `[a, b]` lists, and block lists
 * (`key:` followed by `- item` lines). Comment lines start with `#`.
 * Not a general-purpose YAML parser.
 */
export function parseSimpleYaml(content: string): Record<string, YamlSection> {
  const result: Record<string, YamlSection> = {};
  let section: YamlSection | undefined;
  let listKey: string | undefined;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) continue;

    // Top-level key (no leading whitespace)
    if (!line.startsWith(' ') && !line.startsWith('\t')) {
      const name = trimmed.split(':')[0]?.trim() ?? '';
      section = {};
      result[name] = section;
      listKey = undefined;
      continue;
    }

    if (section === undefined) continue;

    // Block list item under the last empty key
    if (trimmed.startsWith('- ')) {
      const list = listKey === undefined ? undefined : section[listKey];
      if (Array.isArray(list)) list.push(unquote(trimmed.slice(2).trim()));
      continue;
    }

    const colonIdx = trimmed.indexOf(':');
    if (colonIdx === -1) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const raw = trimmed.slice(colonIdx + 1).trim();

    if (raw === '') {
      section[key] = [];
      listKey = key;
      continue;
    }

    listKey = undefined;
    section[key] = parseValue(raw);
  }

  return result;
}
