import type { TranslationRequestDto, TranslationResultDto, TranslatorConfigDto } from '@/api/translator'
import type { TranslationRequest, TranslationResult, TranslatorConfig } from '@/domain/types'
import { copyRecord, type Mapper } from './mapper'

export const translationRequestMapper: Mapper<TranslationRequestDto, TranslationRequest> = {
  toEntity: (dto) => ({
    pseudocode: dto.pseudocode,
    targetLanguage: dto.targetLanguage,
    options: copyRecord(dto.options),
  }),
  fromEntity: (request) => ({
    pseudocode: request.pseudocode,
    targetLanguage: request.targetLanguage,
    options: copyRecord(request.options),
  }),
}

export const translationResultMapper: Mapper<TranslationResultDto, TranslationResult> = {
  toEntity: (dto) => ({
    requestId: dto.requestId,
    translatedCode: dto.translatedCode,
    language: dto.language,
    confidence: dto.confidence,
    metadata: copyRecord(dto.metadata),
  }),
  fromEntity: (result) => ({
    requestId: result.requestId,
    translatedCode: result.translatedCode,
    language: result.language,
    confidence: result.confidence,
    metadata: copyRecord(result.metadata),
  }),
}

export const translatorConfigMapper: Mapper<TranslatorConfigDto, TranslatorConfig> = {
  toEntity: (dto) => ({
    defaultLanguage: dto.defaultLanguage,
    availableLanguages: [...dto.availableLanguages],
    modelSettings: copyRecord(dto.modelSettings),
  }),
  fromEntity: (config) => ({
    defaultLanguage: config.defaultLanguage,
    availableLanguages: [...config.availableLanguages],
    modelSettings: copyRecord(config.modelSettings),
  }),
}
