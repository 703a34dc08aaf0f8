import type { ReadDocumentInput } from './dto';
import type { UseCase } from './usecase';

/** Resolves to plain text or markdown; failures are rendered, never thrown. */
export type ReadDocumentUseCase = UseCase<ReadDocumentInput, string>;
