/**
 * Reading and patching `nvda.ini`.
 *
 * The file is indentation-nested: `[section]` opens a top-level section and
 * `[[name]]` a subsection inside it. Only top-level keys are read or patched.
 */

import { readFile } from 'node:fs/promises';

export const NVDA_INI_FILE_NAME = 'nvda.ini';

const DEFAULT_INI_URL = new URL('../../assets/nvda.default.ini', import.meta.url);

/**
 * One top-level setting the CI image depends on.
 */
export interface IniSetting {
  section: string;
  key: string;
  value: string;
}

/**
 * Settings every built image must carry: no update prompts, speech routed to
 * the capture synthesizer.
 */
export const REQUIRED_SETTINGS: readonly IniSetting[] = [
  { section: 'update', key: 'autoCheck', value: 'False' },
  { section: 'speech', key: 'synth', value: 'captureSpeech' },
];

const SECTION_RE = /^\s*\[([^[\]]+)\]\s*$/;
const SUBSECTION_RE = /^\s*\[\[/;
const KEY_RE = /^(\s*)([A-Za-z0-9_]+)\s*=\s*(.*?)\s*$/;

/**
 * Walks top-level key lines, calling `visit` with the enclosing section.
 */
function forEachTopLevelKey(
  lines: string[],
  visit: (index: number, section: string, key: string, indent: string, value: string) => void
): void {
  let section: string | null = null;
  let inSubsection = false;

  lines.forEach((line, index) => {
    if (SUBSECTION_RE.test(line)) {
      inSubsection = true;
      return;
    }
    const header = line.match(SECTION_RE);
    if (header) {
      section = header[1].trim();
      inSubsection = false;
      return;
    }
    if (section === null || inSubsection) return;
    const entry = line.match(KEY_RE);
    if (entry) {
      visit(index, section, entry[2], entry[1], entry[3]);
    }
  });
}

/**
 * Value of a top-level setting, or null when absent.
 */
export function readIniSetting(text: string, section: string, key: string): string | null {
  let found: string | null = null;
  forEachTopLevelKey(text.split(/\r?\n/), (_index, s, k, _indent, value) => {
    if (found === null && s === section && k === key) found = value;
  });
  return found;
}

/**
 * Settings from `settings` whose value differs from the text.
 */
export function unmetSettings(text: string, settings: readonly IniSetting[]): IniSetting[] {
  return settings.filter((s) => readIniSetting(text, s.section, s.key) !== s.value);
}

/**
 * Rewrites existing top-level keys in place. Keys that do not exist are
 * reported in `missing` and left out; line endings are preserved.
 */
export function patchIniSettings(
  text: string,
  settings: readonly IniSetting[]
): { text: string; missing: IniSetting[] } {
  const eol = text.includes('\r\n') ? '\r\n' : '\n';
  const lines = text.split(/\r?\n/);
  const patched = new Set<IniSetting>();

  forEachTopLevelKey(lines, (index, section, key, indent) => {
    const setting = settings.find((s) => s.section === section && s.key === key);
    if (setting) {
      lines[index] = `${indent}${key} = ${setting.value}`;
      patched.add(setting);
    }
  });

  return {
    text: lines.join(eol),
    missing: settings.filter((s) => !patched.has(s)),
  };
}

/**
 * Bundled default `nvda.ini` for a CI image.
 */
export async function loadDefaultIni(): Promise<string> {
  return readFile(DEFAULT_INI_URL, 'utf-8');
}
