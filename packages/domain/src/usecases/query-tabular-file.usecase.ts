import type { QueryTabularFileInput } from './dto';
import type { UseCase } from './usecase';

/** Resolves to a markdown report; failures are rendered, never thrown. */
export type QueryTabularFileUseCase = UseCase<QueryTabularFileInput, string>;
