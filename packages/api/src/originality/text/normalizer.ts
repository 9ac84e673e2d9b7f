import { UpstreamInputError } from '../../common/errors/originality.errors';
import { ContentKind, ContentUnit, SubmissionFileInput } from '../originality.types';

export type LanguageFamily = 'python' | 'c_family';

const EXTENSION_LANGUAGES = new Map<string, string>([
  ['py', 'python'],
  ['js', 'javascript'],
  ['jsx', 'javascript'],
  ['mjs', 'javascript'],
  ['cjs', 'javascript'],
  ['ts', 'typescript'],
  ['tsx', 'typescript'],
  ['java', 'java'],
  ['c', 'c'],
  ['h', 'c'],
  ['cpp', 'cpp'],
  ['cc', 'cpp'],
  ['hpp', 'cpp'],
  ['cs', 'csharp'],
  ['go', 'go'],
  ['rs', 'rust'],
  ['kt', 'kotlin'],
  ['swift', 'swift'],
  ['php', 'php'],
  ['rb', 'ruby'],
]);

const PROSE_EXTENSIONS = new Set(['txt', 'md', 'rst', 'tex', 'doc', 'docx', 'pdf', 'odt']);

const CONTENT_HINTS: Array<{ language: string; patterns: RegExp[] }> = [
  {
    language: 'python',
    patterns: [/^\s*def\s+\w+\s*\(.*\)\s*:/m, /^\s*(from\s+\w+(\.\w+)*\s+)?import\s+\w+/m, /^\s*class\s+\w+.*:\s*$/m, /\bprint\s*\(/],
  },
  {
    language: 'java',
    patterns: [/\bpublic\s+(static\s+)?(class|void)\b/, /\bSystem\.out\.print/, /\bimport\s+java\./],
  },
  {
    language: 'cpp',
    patterns: [/#include\s*<\w+(\.h)?>/, /\bstd::/, /\busing\s+namespace\b/],
  },
  {
    language: 'javascript',
    patterns: [/\b(const|let|var)\s+\w+\s*=/, /\bfunction\s+\w+\s*\(/, /=>\s*[{(]/, /\bconsole\.log\s*\(/],
  },
];

export function languageFamily(language: string | null): LanguageFamily | null {
  if (!language) return null;
  if (language === 'python') return 'python';
  if (language === 'ruby') return null;
  return 'c_family';
}

function extensionOf(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot >= 0 ? fileName.slice(dot + 1).toLowerCase() : '';
}

export function detectLanguage(fileName: string, text: string): string | null {
  const ext = extensionOf(fileName);
  const byExtension = EXTENSION_LANGUAGES.get(ext);
  if (byExtension) return byExtension;
  if (PROSE_EXTENSIONS.has(ext)) return null;

  let best: { language: string; hits: number } | null = null;
  for (const hint of CONTENT_HINTS) {
    const hits = hint.patterns.filter((pattern) => pattern.test(text)).length;
    if (hits >= 2 && (!best || hits > best.hits)) {
      best = { language: hint.language, hits };
    }
  }
  return best?.language ?? null;
}

function looksLikeProse(text: string): boolean {
  const words = text.match(/[A-Za-z]{2,}/g) ?? [];
  if (words.length < 5) return false;
  const letters = (text.match(/[A-Za-z\s.,;:'"!?-]/g) ?? []).length;
  return letters / text.length > 0.85;
}

export function isLikelyBinary(text: string): boolean {
  if (!text) {
    return true;
  }

  let nonPrintable = 0;
  for (let index = 0; index < text.length; index += 1) {
    const code = text.charCodeAt(index);
    const isPrintable = code === 9 || code === 10 || code === 13 || code >= 32;
    if (!isPrintable || code === 0xfffd) {
      nonPrintable += 1;
    }
  }

  return nonPrintable / text.length > 0.22;
}

/**
 * Removes formatting noise that carries no authorship signal: BOM and
 * zero-width characters, CR line endings, tabs, trailing spaces and runs of
 * blank lines.
 */
export function normalizeText(raw: string): string {
  const lines = raw
    .normalize('NFC')
    .replace(/^\uFEFF/, '')
    .replace(/[\u200B-\u200D\u2060\uFEFF]/g, '')
    .replace(/\r\n?/g, '\n')
    .replace(/\t/g, '    ')
    .split('\n')
    .map((line) => line.replace(/\s+$/, ''));

  const collapsed: string[] = [];
  let blankRun = 0;
  for (const line of lines) {
    blankRun = line === '' ? blankRun + 1 : 0;
    if (blankRun <= 1) collapsed.push(line);
  }

  return collapsed.join('\n').replace(/^\n+/, '').replace(/\n+$/, '');
}

export function resolveContentKind(
  declared: ContentKind,
  language: string | null,
  normalized: string,
): ContentKind {
  if (declared !== 'unknown') return declared;
  if (language) return 'code';
  return looksLikeProse(normalized) ? 'natural_language' : 'unknown';
}

/**
 * Builds a ContentUnit from one extracted file. Throws UpstreamInputError when
 * the text cannot be analyzed.
 */
export function buildContentUnit(
  file: SubmissionFileInput,
  index: number,
  maxCompareChars = 50_000,
): ContentUnit {
  if (file.text.trim() === '') {
    throw new UpstreamInputError(file.fileName, 'empty text');
  }
  if (isLikelyBinary(file.text)) {
    throw new UpstreamInputError(file.fileName, 'text looks binary or unreadable');
  }

  const normalizedText = normalizeText(file.text);
  const detected = detectLanguage(file.fileName, normalizedText);
  const kind = resolveContentKind(file.contentKind, detected, normalizedText);

  return {
    index,
    fileName: file.fileName,
    rawText: file.text,
    normalizedText,
    kind,
    language: kind === 'code' ? detected : null,
    truncated: normalizedText.length > maxCompareChars,
  };
}
