/**
 * JSONExtractor
 *
 * Pulls a JSON value out of free-form model output. Tries, in order:
 * the whole text, a fenced markdown block, the span between the first opening
 * and last closing bracket, then every balanced `{...}` candidate (longest first).
 */

export type ExtractionMethod = 'pure_json' | 'markdown_block' | 'text_stripped' | 'brace_matching';

export type ExtractionResult =
  | { success: true; data: unknown; method: ExtractionMethod }
  | { success: false; error: string; parseErrors: string[] };

export class JSONExtractor {
  static extract(output: string): ExtractionResult {
    const parseErrors: string[] = [];
    const trimmed = output.trim();

    if (!trimmed) {
      return { success: false, error: 'Empty response', parseErrors };
    }

    // STEP 1: pure JSON
    if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
      const parsed = this.tryParse(trimmed, parseErrors, 'Pure');
      if (parsed.ok) {
        return { success: true, data: parsed.value, method: 'pure_json' };
      }
    }

    // STEP 2: fenced block
    const fenced = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/);
    if (fenced) {
      const parsed = this.tryParse(fenced[1].trim(), parseErrors, 'Markdown');
      if (parsed.ok) {
        return { success: true, data: parsed.value, method: 'markdown_block' };
      }
    }

    // STEP 3: strip preamble/epilogue
    const stripped = this.stripToBrackets(trimmed);
    if (stripped) {
      const parsed = this.tryParse(stripped, parseErrors, 'Strip');
      if (parsed.ok) {
        return { success: true, data: parsed.value, method: 'text_stripped' };
      }
    }

    // STEP 4: balanced braces with string tracking
    const candidates = this.findObjectCandidates(trimmed).sort((a, b) => b.length - a.length);
    for (const candidate of candidates) {
      const parsed = this.tryParse(candidate, parseErrors, 'Brace match');
      if (parsed.ok) {
        return { success: true, data: parsed.value, method: 'brace_matching' };
      }
    }

    return { success: false, error: 'No JSON found in response', parseErrors };
  }

  private static tryParse(
    text: string,
    parseErrors: string[],
    label: string
  ): { ok: true; value: unknown } | { ok: false } {
    try {
      const value: unknown = JSON.parse(text);
      return { ok: true, value };
    } catch (e) {
      parseErrors.push(`${label} parse error: ${e instanceof Error ? e.message.substring(0, 100) : String(e)}`);
      return { ok: false };
    }
  }

  private static stripToBrackets(text: string): string | null {
    const firstObject = text.indexOf('{');
    const firstArray = text.indexOf('[');
    const useArray = firstArray !== -1 && (firstObject === -1 || firstArray < firstObject);
    const open = useArray ? firstArray : firstObject;
    const close = text.lastIndexOf(useArray ? ']' : '}');

    if (open === -1 || close <= open) {
      return null;
    }
    return text.substring(open, close + 1);
  }

  private static findObjectCandidates(text: string): string[] {
    const candidates: string[] = [];
    let i = 0;

    while (i < text.length) {
      if (text[i] === '{') {
        const end = this.findBalancedEnd(text, i);
        if (end !== -1) {
          candidates.push(text.substring(i, end + 1));
          i = end + 1;
          continue;
        }
      }
      i++;
    }

    return candidates;
  }

  /**
   * Index of the brace closing the one at `start`, ignoring braces inside strings
   */
  private static findBalancedEnd(text: string, start: number): number {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
      const char = text[i];

      if (escaped) {
        escaped = false;
        continue;
      }
      if (char === '\\' && inString) {
        escaped = true;
        continue;
      }
      if (char === '"') {
        inString = !inString;
        continue;
      }
      if (inString) continue;

      if (char === '{') depth++;
      if (char === '}') {
        depth--;
        if (depth === 0) return i;
      }
    }

    return -1;
  }
}
