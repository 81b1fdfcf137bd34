import axios from 'axios';
import { describeError } from './errors.js';

export const UNTRANSLATED_MARKER = '[untranslated]';

export interface Translator {
  readonly enabled: boolean;
  /** Never rejects: a failed translation yields the source text marked with {@link UNTRANSLATED_MARKER}. */
  translate(text: string, targetLocale: string): Promise<string>;
}

export const passthroughTranslator: Translator = {
  enabled: false,
  translate: async text => text,
};

export type HttpPost = (url: string, body: Record<string, unknown>) => Promise<unknown>;

const axiosPost: HttpPost = async (url, body) => {
  const res = await axios.post<unknown>(url, body, { timeout: 15_000 });
  return res.data;
};

function translatedText(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null || !('translatedText' in data)) return undefined;
  return typeof data.translatedText === 'string' ? data.translatedText : undefined;
}

/** Client for a LibreTranslate-compatible `/translate` endpoint. */
export class LibreTranslator implements Translator {
  readonly enabled = true;

  constructor(
    private readonly opts: { url: string; apiKey?: string; sourceLocale: string },
    private readonly post: HttpPost = axiosPost,
  ) {}

  async translate(text: string, targetLocale: string): Promise<string> {
    if (!text.trim() || targetLocale === this.opts.sourceLocale) return text;
    try {
      const data = await this.post(new URL('/translate', this.opts.url).toString(), {
        q: text,
        source: this.opts.sourceLocale,
        target: targetLocale,
        format: 'text',
        ...(this.opts.apiKey ? { api_key: this.opts.apiKey } : {}),
      });
      const out = translatedText(data);
      if (out === undefined) throw new Error('Response carried no translatedText');
      return out;
    } catch (err) {
      console.error('[translate] Translation failed', { targetLocale, err: describeError(err) });
      return `${UNTRANSLATED_MARKER} ${text}`;
    }
  }
}

/**
 * Per-tick memo over a translator so that an event rendered for several
 * audiences in the same locale is translated once per distinct text.
 */
export class TranslationCache {
  private readonly memo = new Map<string, Promise<string>>();

  constructor(private readonly translator: Translator) {}

  translate(text: string, locale: string): Promise<string> {
    const key = `${locale}\u0000${text}`;
    let hit = this.memo.get(key);
    if (!hit) {
      hit = this.translator.translate(text, locale);
      this.memo.set(key, hit);
    }
    return hit;
  }
}
