/**
 * Request bodies for POST /generate-plan, POST /batch/run and POST /convert-plan.
 */

import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsIn,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import type { FloorPlanOptions, ReferenceUnit } from '../../types/options.types.js';

const REFERENCE_UNITS: ReferenceUnit[] = ['m', 'cm', 'mm'];

export class FloorPlanOptionsDto {
  @IsOptional()
  @IsBoolean()
  hasRoomNames?: boolean;

  @IsOptional()
  @IsBoolean()
  hasArea?: boolean;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  referenceLabel?: string;

  @IsOptional()
  @IsNumber()
  @IsPositive()
  referenceWidth?: number;

  @IsOptional()
  @IsIn(REFERENCE_UNITS)
  referenceUnit?: ReferenceUnit;

  @IsOptional()
  @IsString()
  planCategory?: string;
}

export class PlanRequestDto {
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(200)
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  fileIds!: string[];

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  templateId?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => FloorPlanOptionsDto)
  options?: FloorPlanOptionsDto;
}

export class ConvertPlanDto {
  @IsString()
  @IsNotEmpty()
  fileId!: string;
}

/** Applies the option defaults: names and areas present, metres */
export function toFloorPlanOptions(dto: FloorPlanOptionsDto = {}): FloorPlanOptions {
  return {
    hasRoomNames: dto.hasRoomNames ?? true,
    hasArea: dto.hasArea ?? true,
    referenceUnit: dto.referenceUnit ?? 'm',
    ...(dto.referenceLabel?.trim() ? { referenceLabel: dto.referenceLabel.trim() } : {}),
    ...(dto.referenceWidth !== undefined ? { referenceWidth: dto.referenceWidth } : {}),
    ...(dto.planCategory ? { planCategory: dto.planCategory } : {}),
  };
}
