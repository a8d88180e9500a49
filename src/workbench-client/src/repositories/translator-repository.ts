import type { TranslatorApi } from '@/api/translator'
import { validationFailure, type Result } from '@/domain/failure'
import type { TranslationRequest, TranslationResult, TranslatorConfig } from '@/domain/types'
import { translationRequestMapper, translationResultMapper, translatorConfigMapper } from '@/mappers/translator-mapper'
import { attempt, isBlank, rejected } from './repository'

export class TranslatorRepository {
  constructor(private readonly api: TranslatorApi) {}

  translate(request: TranslationRequest): Promise<Result<TranslationResult>> {
    if (isBlank(request.pseudocode)) return rejected(validationFailure('Pseudocode must not be empty'))
    if (isBlank(request.targetLanguage)) return rejected(validationFailure('Target language must not be empty'))
    const dto = translationRequestMapper.fromEntity({ ...request, targetLanguage: request.targetLanguage.trim() })
    return attempt(async () => translationResultMapper.toEntity(await this.api.translate(dto)))
  }

  getSupportedLanguages(): Promise<Result<string[]>> {
    return attempt(() => this.api.languages())
  }

  getTranslatorConfig(): Promise<Result<TranslatorConfig>> {
    return attempt(async () => translatorConfigMapper.toEntity(await this.api.config()))
  }

  updateTranslatorConfig(config: TranslatorConfig): Promise<Result<void>> {
    if (isBlank(config.defaultLanguage)) return rejected(validationFailure('Default language must not be empty'))
    return attempt(() => this.api.updateConfig(translatorConfigMapper.fromEntity(config)))
  }
}
