import { EXPORT_FORMATS, EXPORT_TYPES, SESSION_MODELS, TRANSLATION_LANGUAGES } from '../types.js';
import type { ExportFormat, ExportType, SessionModel, TranslationLanguage } from '../types.js';

const LANGUAGE_ALIASES: Record<string, TranslationLanguage> = {
  zh: 'zh',
  'zh-cn': 'zh',
  en: 'en',
  'en-us': 'en',
  ja: 'ja',
  ko: 'ko',
  kr: 'ko',
  fr: 'fr',
  de: 'de',
};

export function parseSessionModel(value: string): SessionModel {
  const normalized = value.trim().toLowerCase();
  const match = SESSION_MODELS.find((model) => model === normalized);
  if (!match) {
    throw new Error(`unsupported model '${normalized}' (expected ${SESSION_MODELS.map((m) => `'${m}'`).join(', ')})`);
  }
  return match;
}

export function parseTranslationLanguage(value: string): TranslationLanguage {
  const normalized = value.trim().toLowerCase();
  const match = LANGUAGE_ALIASES[normalized];
  if (!match) {
    throw new Error(`unsupported language code '${normalized}' (expected one of ${TRANSLATION_LANGUAGES.join(', ')})`);
  }
  return match;
}

export function parseExportType(value: string): ExportType {
  const normalized = value.trim().toLowerCase();
  const match = EXPORT_TYPES.find((type) => type === normalized);
  if (!match) {
    throw new Error(`unsupported export type '${normalized}' (expected one of ${EXPORT_TYPES.join(', ')})`);
  }
  return match;
}

export function parseExportFormat(value: string): ExportFormat {
  const normalized = value.trim().toLowerCase();
  const match = EXPORT_FORMATS.find((format) => format === normalized);
  if (!match) {
    throw new Error(`unsupported export format '${normalized}' (expected one of ${EXPORT_FORMATS.join(', ')})`);
  }
  return match;
}
