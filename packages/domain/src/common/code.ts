export type CodeDescription = {
  code: number;
  message: string;
};

export class Code {
  public static READ_ONLY_QUERY_ERROR: CodeDescription = {
    code: 403,
    message: 'Only read-only queries are allowed.',
  };

  public static DATASET_EMPTY_ERROR: CodeDescription = {
    code: 422,
    message: 'Dataset is empty.',
  };

  public static DATASET_UNREADABLE_ERROR: CodeDescription = {
    code: 422,
    message: 'Dataset could not be read.',
  };

  public static DOCUMENT_UNREADABLE_ERROR: CodeDescription = {
    code: 422,
    message: 'Document could not be read.',
  };
}
