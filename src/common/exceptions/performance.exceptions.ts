import {
  BadRequestException,
  ConflictException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';

export type PerformanceErrorCode =
  | 'INVALID_PERCENTAGE'
  | 'UNKNOWN_SYSTEM'
  | 'INVALID_GRADING_SYSTEM'
  | 'INVALID_COMPOSITE_DEFINITION'
  | 'INVALID_MARK_SCALE'
  | 'INVALID_SUBJECT_SCALE'
  | 'DUPLICATE_MARK';

export class InvalidPercentageException extends BadRequestException {
  readonly code: PerformanceErrorCode = 'INVALID_PERCENTAGE';

  constructor(readonly percentage: number) {
    super(`Percentage ${percentage} is outside 0..100`);
  }
}

export class UnknownSystemException extends NotFoundException {
  readonly code: PerformanceErrorCode = 'UNKNOWN_SYSTEM';

  constructor(readonly systemId: string) {
    super(`Grading system '${systemId}' is not registered`);
  }
}

export class InvalidGradingSystemException extends BadRequestException {
  readonly code: PerformanceErrorCode = 'INVALID_GRADING_SYSTEM';

  constructor(readonly systemId: string, readonly reason: string) {
    super(`Grading system '${systemId}' is invalid: ${reason}`);
  }
}

export class InvalidCompositeDefinitionException extends UnprocessableEntityException {
  readonly code: PerformanceErrorCode = 'INVALID_COMPOSITE_DEFINITION';

  constructor(readonly subjectId: string, readonly reason: string) {
    super(`Composite subject '${subjectId}' is misconfigured: ${reason}`);
  }
}

export class InvalidMarkScaleException extends BadRequestException {
  readonly code: PerformanceErrorCode = 'INVALID_MARK_SCALE';

  constructor(
    readonly studentId: string,
    readonly subjectOrComponentId: string,
    readonly rawScore: number,
    readonly maxRawScore: number,
  ) {
    super(
      `Mark ${rawScore}/${maxRawScore} for student '${studentId}' on '${subjectOrComponentId}' is outside its scale`,
    );
  }
}

// subjectId is 'default' when the scale comes from the run's settings
export class InvalidSubjectScaleException extends BadRequestException {
  readonly code: PerformanceErrorCode = 'INVALID_SUBJECT_SCALE';

  constructor(readonly subjectId: string, readonly scale: number) {
    super(`Subject scale ${scale} for '${subjectId}' must be a positive number`);
  }
}

export class DuplicateMarkException extends ConflictException {
  readonly code: PerformanceErrorCode = 'DUPLICATE_MARK';

  constructor(readonly studentId: string, readonly subjectOrComponentId: string) {
    super(`Student '${studentId}' has more than one mark for '${subjectOrComponentId}'`);
  }
}
