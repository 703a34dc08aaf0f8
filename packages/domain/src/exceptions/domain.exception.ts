import type { CodeDescription } from '../common/code';

export type CreateExceptionPayload<TData> = {
  code: CodeDescription;
  overrideMessage?: string;
  data?: TData;
};

export class DomainException<TData = unknown> extends Error {
  public readonly code: number;
  public readonly data?: TData;

  private constructor(
    codeDescription: CodeDescription,
    overrideMessage?: string,
    data?: TData,
  ) {
    super(overrideMessage ?? codeDescription.message);
    this.name = 'DomainException';
    this.code = codeDescription.code;
    this.data = data;
  }

  public static new<TData = unknown>(
    payload: CreateExceptionPayload<TData>,
  ): DomainException<TData> {
    return new DomainException(
      payload.code,
      payload.overrideMessage,
      payload.data,
    );
  }
}
