import 'reflect-metadata';
import { IsArray, IsEnum, IsInt, IsString } from 'class-validator';
import { AnnotationType, Severity } from '../../domain';
import { OptionalKey } from './decorators';

export class AnnotationDto {
  @IsString()
  path!: string;

  @IsInt()
  line!: number;

  @IsString()
  message!: string;

  @OptionalKey()
  @IsEnum(Severity)
  severity?: Severity;

  @OptionalKey()
  @IsEnum(AnnotationType)
  type?: AnnotationType;

  @OptionalKey()
  @IsString()
  link?: string;

  @OptionalKey()
  @IsString()
  externalId?: string;
}

export class AnnotationBatchDto {
  @IsArray()
  annotations!: AnnotationDto[];
}

export const ANNOTATION_KEYS = [
  'path',
  'line',
  'message',
  'severity',
  'type',
  'link',
  'externalId',
] as const;

export const ANNOTATION_BATCH_KEYS = ['annotations'] as const;
