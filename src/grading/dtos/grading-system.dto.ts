import { plainToInstance, Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsNotEmpty,
  IsNumber,
  IsString,
  Max,
  Min,
  ValidateNested,
  ValidationError,
  validateSync,
} from 'class-validator';
import { GradingSystemDefinition } from '../../common/types/performance.types';
import { InvalidGradingSystemException } from '../../common/exceptions/performance.exceptions';

export class GradeBandDto {
  @IsNumber() @Min(0) @Max(100) minPercentage!: number;
  @IsString() @IsNotEmpty() label!: string;
  @IsString() name!: string;
  @IsNumber() @Min(0) points!: number;
}

export class GradingSystemDto {
  @IsString() @IsNotEmpty() id!: string;
  @IsString() @IsNotEmpty() name!: string;
  @IsNumber() @Min(0) @Max(100) passMarkPercentage!: number;

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => GradeBandDto)
  bands!: GradeBandDto[];
}

function firstConstraint(errors: ValidationError[], path = ''): string {
  for (const error of errors) {
    const at = path ? `${path}.${error.property}` : error.property;
    const messages = Object.values(error.constraints ?? {});
    if (messages.length > 0) return `${at}: ${messages[0]}`;
    if (error.children?.length) return firstConstraint(error.children, at);
  }
  return 'failed validation';
}

/** Checks the shape of grading tables coming from config or the database. */
export function toGradingSystemDefinitions(plain: readonly object[]): GradingSystemDefinition[] {
  return plain.map((raw, index) => {
    const dto = plainToInstance(GradingSystemDto, raw);
    const errors = validateSync(dto);
    if (errors.length > 0) {
      const id = typeof dto.id === 'string' && dto.id ? dto.id : `#${index}`;
      throw new InvalidGradingSystemException(id, firstConstraint(errors));
    }
    return {
      id: dto.id,
      name: dto.name,
      passMarkPercentage: dto.passMarkPercentage,
      bands: dto.bands.map((b) => ({ minPercentage: b.minPercentage, label: b.label, name: b.name, points: b.points })),
    };
  });
}
