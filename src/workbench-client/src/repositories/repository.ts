import { fail, normalize, ok, validationFailure, type Failure, type Result } from '@/domain/failure'
import type { Mapper } from '@/mappers/mapper'

export interface CrudDataSource<TDto, TQuery> {
  list(query?: TQuery): Promise<TDto[]>
  get(id: string): Promise<TDto>
  create(dto: TDto): Promise<TDto>
  update(dto: TDto): Promise<TDto>
  remove(id: string): Promise<void>
}

/** Runs one data-source call and folds anything it throws into a Failure. */
export async function attempt<T>(operation: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await operation())
  } catch (error) {
    return fail(normalize(error))
  }
}

export function rejected(failure: Failure): Promise<Result<never>> {
  return Promise.resolve(fail(failure))
}

export function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim() === ''
}

export class CrudRepository<TDto, TEntity extends { id: string }, TQuery> {
  constructor(
    protected readonly source: CrudDataSource<TDto, TQuery>,
    protected readonly mapper: Mapper<TDto, TEntity>,
    protected readonly label: string,
  ) {}

  list(query?: TQuery): Promise<Result<TEntity[]>> {
    return attempt(async () => (await this.source.list(query)).map((dto) => this.mapper.toEntity(dto)))
  }

  get(id: string): Promise<Result<TEntity>> {
    if (isBlank(id)) return rejected(validationFailure(`${this.label} id must not be empty`))
    return attempt(async () => this.mapper.toEntity(await this.source.get(id.trim())))
  }

  create(entity: TEntity): Promise<Result<TEntity>> {
    return attempt(async () => this.mapper.toEntity(await this.source.create(this.mapper.fromEntity(entity))))
  }

  update(entity: TEntity): Promise<Result<TEntity>> {
    if (isBlank(entity.id)) return rejected(validationFailure(`${this.label} must be saved before it can be updated`))
    return attempt(async () => this.mapper.toEntity(await this.source.update(this.mapper.fromEntity(entity))))
  }

  remove(id: string): Promise<Result<void>> {
    if (isBlank(id)) return rejected(validationFailure(`${this.label} id must not be empty`))
    return attempt(() => this.source.remove(id.trim()))
  }
}
