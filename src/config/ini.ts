/**
 * Minimal reader for the shared config/credentials INI format
 */

export interface IniSection {
  values: Record<string, string>;
  /** Indented blocks such as `s3 =` followed by `  endpoint_url = ...` */
  nested: Record<string, Record<string, string>>;
}

export type IniDocument = Record<string, IniSection>;

const SECTION_HEADER = /^\[([^\]]+)\]$/;

/**
 * Parse INI text. Keys are lowercased; `#` and `;` start comment lines.
 * Assignments before the first section header are ignored.
 */
export function parseIni(text: string): IniDocument {
  const document: IniDocument = {};
  let section: IniSection | undefined;
  let nested: Record<string, string> | undefined;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) {
      continue;
    }

    const indented = /^\s/.test(rawLine);
    const header = SECTION_HEADER.exec(line);

    if (header) {
      const name = header[1].trim();
      section = document[name] ?? { values: {}, nested: {} };
      document[name] = section;
      nested = undefined;
      continue;
    }

    const separator = line.indexOf('=');
    if (separator === -1 || !section) {
      continue;
    }

    const key = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();

    if (indented && nested) {
      nested[key] = value;
    } else if (value === '') {
      nested = {};
      section.nested[key] = nested;
    } else {
      nested = undefined;
      section.values[key] = value;
    }
  }

  return document;
}
