import { z } from 'zod'
import type { ApiClient } from './client'
import { decode, metadata, optionalId, stringList, wireObject } from './decode'
import { endpoints } from './endpoints'
import { normalizeList } from '@/lib/list'

export const translationResultSchema = wireObject({
  requestId: optionalId,
  translatedCode: z.string(),
  language: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
  confidence: z
    .number()
    .min(0)
    .max(1)
    .nullish()
    .transform((value) => value ?? 0),
  metadata,
})

export type TranslationResultDto = z.output<typeof translationResultSchema>

export interface TranslationRequestDto {
  pseudocode: string
  targetLanguage: string
  options: Record<string, unknown> | null
}

export const translatorConfigSchema = wireObject({
  defaultLanguage: z.string().min(1),
  availableLanguages: stringList,
  modelSettings: metadata,
})

export type TranslatorConfigDto = z.output<typeof translatorConfigSchema>

const languageEntry = z.union([
  z.string(),
  z
    .object({ code: z.string().optional(), name: z.string().optional(), language: z.string().optional() })
    .transform((entry) => entry.code ?? entry.language ?? entry.name ?? ''),
])

const languagesSchema = z.preprocess(
  (raw) => (typeof raw === 'object' && raw !== null && !Array.isArray(raw) ? Reflect.get(raw, 'languages') : raw),
  z.array(languageEntry).transform((entries) => normalizeList(entries)),
)

export function createTranslatorApi(http: ApiClient) {
  return {
    async translate(request: TranslationRequestDto): Promise<TranslationResultDto> {
      const body: Record<string, unknown> = {
        pseudocode: request.pseudocode,
        target_language: request.targetLanguage,
      }
      if (request.options) body.options = request.options
      const raw = await http.post(endpoints.translator, body, { fallback: 'Unable to translate pseudocode' })
      return decode(translationResultSchema, raw, 'Translation')
    },

    /** Entries come as plain names or as `{ code, name }` objects. */
    async languages(): Promise<string[]> {
      const raw = await http.get(endpoints.translatorLanguages, { fallback: 'Unable to load supported languages' })
      return decode(languagesSchema, raw, 'Supported languages')
    },

    async config(): Promise<TranslatorConfigDto> {
      const raw = await http.get(endpoints.translatorConfig, { fallback: 'Unable to load translator config' })
      return decode(translatorConfigSchema, raw, 'Translator config')
    },

    async updateConfig(config: TranslatorConfigDto): Promise<void> {
      await http.put(
        endpoints.translatorConfig,
        {
          default_language: config.defaultLanguage,
          available_languages: config.availableLanguages,
          model_settings: config.modelSettings,
        },
        { fallback: 'Unable to update translator config' },
      )
    },
  }
}

export type TranslatorApi = ReturnType<typeof createTranslatorApi>
