/**
 * WireGuard Tunnel Config Document
 *
 * Structured, lossless view of a wg-quick configuration file. Every line is
 * kept with its original text and line ending; directives additionally
 * expose the byte range of their value so a patch can replace the value
 * and nothing else. Serializing an unmodified document returns the input
 * unchanged.
 */

export interface SectionLine {
  kind: "section";
  raw: string;
  eol: string;
  name: string;
}

export interface DirectiveLine {
  kind: "directive";
  raw: string;
  eol: string;
  key: string;
  value: string;
  /** Offset of the value inside `raw` */
  valueStart: number;
  /** Index of the enclosing section line, or -1 before the first section */
  sectionIndex: number;
}

export interface OtherLine {
  kind: "other";
  raw: string;
  eol: string;
}

export type TunnelConfigLine = SectionLine | DirectiveLine | OtherLine;

export interface TunnelConfigDocument {
  lines: TunnelConfigLine[];
}

export interface ConfigSection {
  index: number;
  name: string;
  directives: DirectiveLine[];
}

const SECTION_PATTERN = /^\s*\[([^\]]+)\]\s*(?:#.*)?$/;
// key, separator, value (without trailing whitespace or comment)
const DIRECTIVE_PATTERN = /^(\s*)([A-Za-z][A-Za-z0-9]*)(\s*=\s*)([^#]*?)(\s*(?:#.*)?)$/;

export function parseTunnelConfig(text: string): TunnelConfigDocument {
  const lines: TunnelConfigLine[] = [];
  const parts = text.split(/(\r?\n)/);
  let sectionIndex = -1;

  for (let i = 0; i < parts.length; i += 2) {
    const raw = parts[i] ?? "";
    const eol = parts[i + 1] ?? "";
    if (raw === "" && eol === "" && i === parts.length - 1) break;

    const section = SECTION_PATTERN.exec(raw);
    if (section) {
      sectionIndex = lines.length;
      lines.push({ kind: "section", raw, eol, name: section[1].trim() });
      continue;
    }

    const directive = DIRECTIVE_PATTERN.exec(raw);
    if (directive) {
      const [, indent, key, separator, value] = directive;
      lines.push({
        kind: "directive",
        raw,
        eol,
        key,
        value,
        valueStart: indent.length + key.length + separator.length,
        sectionIndex,
      });
      continue;
    }

    lines.push({ kind: "other", raw, eol });
  }

  return { lines };
}

export function serializeTunnelConfig(doc: TunnelConfigDocument): string {
  return doc.lines.map((line) => line.raw + line.eol).join("");
}

export function listSections(doc: TunnelConfigDocument): ConfigSection[] {
  const sections: ConfigSection[] = [];
  doc.lines.forEach((line, index) => {
    if (line.kind === "section") {
      sections.push({ index, name: line.name, directives: [] });
    }
  });

  for (const line of doc.lines) {
    if (line.kind !== "directive" || line.sectionIndex === -1) continue;
    const owner = sections.find((s) => s.index === line.sectionIndex);
    owner?.directives.push(line);
  }

  return sections;
}

/** Directives named `key` (case-insensitive, as wg-quick reads them). */
export function findDirectives(section: ConfigSection, key: string): DirectiveLine[] {
  const wanted = key.toLowerCase();
  return section.directives.filter((d) => d.key.toLowerCase() === wanted);
}

/**
 * Return a copy of `line` whose value is `value`; indentation, separator
 * spacing and any trailing comment stay as they were.
 */
export function withDirectiveValue(line: DirectiveLine, value: string): DirectiveLine {
  const before = line.raw.slice(0, line.valueStart);
  const after = line.raw.slice(line.valueStart + line.value.length);
  return { ...line, raw: before + value + after, value };
}
