import {
  IsBoolean,
  IsIn,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
  ValidateIf,
} from 'class-validator';
import type { MediaResolution } from '../../types/reasoning.types.js';

export class ApiKeyDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  name!: string;

  @IsString()
  @IsNotEmpty()
  value!: string;

  @IsOptional()
  @IsString()
  @MaxLength(120)
  label?: string;
}

/** Either a new prompt or { useDefault: true } */
export class SystemPromptDto {
  @ValidateIf((dto: SystemPromptDto) => !dto.useDefault)
  @IsString()
  @IsNotEmpty()
  prompt?: string;

  @IsOptional()
  @IsBoolean()
  useDefault?: boolean;
}

/** Absent: unchanged. null: back to the provider default. */
export class ModelConfigDto {
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(2)
  temperature?: number | null;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  topP?: number | null;

  @IsOptional()
  @IsIn(['low', 'medium', 'high'])
  mediaResolution?: MediaResolution | null;
}
