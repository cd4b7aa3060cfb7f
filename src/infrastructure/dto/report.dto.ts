import 'reflect-metadata';
import { IsArray, IsDefined, IsEnum, IsInt, IsString } from 'class-validator';
import { DataType, DataValue, ReportResult } from '../../domain';
import { OptionalKey } from './decorators';

export class DataFieldDto {
  @IsString()
  title!: string;

  @IsEnum(DataType)
  type!: DataType;

  // Shape depends on `type`; checked by the report serializer
  @IsDefined()
  value!: DataValue;
}

export class ReportDto {
  @IsString()
  title!: string;

  @OptionalKey()
  @IsString()
  details?: string;

  @OptionalKey()
  @IsEnum(ReportResult)
  result?: ReportResult;

  @OptionalKey()
  @IsArray()
  data?: DataFieldDto[];

  @OptionalKey()
  @IsString()
  reporter?: string;

  @OptionalKey()
  @IsString()
  link?: string;

  @OptionalKey()
  @IsString()
  logoUrl?: string;

  /** Milliseconds since the epoch */
  @OptionalKey()
  @IsInt()
  createdDate?: number;
}

export const DATA_FIELD_KEYS = ['title', 'type', 'value'] as const;

export const REPORT_KEYS = [
  'title',
  'details',
  'result',
  'data',
  'reporter',
  'link',
  'logoUrl',
  'createdDate',
] as const;
