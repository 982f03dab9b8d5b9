import { PipelineError } from '../common/pipeline.error';

export type ClassificationErrorCode =
  | 'invalid_source'
  | 'invalid_source_key'
  | 'unmapped_source'
  | 'ambiguous_source_mapping';

const HTTP_STATUS: Record<ClassificationErrorCode, number> = {
  invalid_source: 400,
  invalid_source_key: 400,
  unmapped_source: 404,
  ambiguous_source_mapping: 409,
};

/** Terminal for the request: no partial attribution is ever returned */
export class ClassificationError extends PipelineError {
  constructor(
    readonly code: ClassificationErrorCode,
    message: string,
    details: Record<string, unknown> = {},
  ) {
    super(code, message, HTTP_STATUS[code], details);
  }
}
