import {
  FIELD_LIMITS,
  optionalText,
  optionalUrl,
  requirePositiveInteger,
  requireText,
} from '../validation';

export const Severity = {
  Low: 'LOW',
  Medium: 'MEDIUM',
  High: 'HIGH',
} as const;

export type Severity = (typeof Severity)[keyof typeof Severity];

export const AnnotationType = {
  Vulnerability: 'VULNERABILITY',
  CodeSmell: 'CODE_SMELL',
  Bug: 'BUG',
} as const;

export type AnnotationType = (typeof AnnotationType)[keyof typeof AnnotationType];

export interface AnnotationProps {
  path: string;
  line: number;
  message: string;
  severity?: Severity;
  type?: AnnotationType;
  link?: string;
  externalId?: string;
}

/**
 * A single finding tied to a file and line, e.g. a linter warning.
 */
export class Annotation {
  private readonly _path: string;
  private readonly _line: number;
  private readonly _message: string;
  private readonly _severity: Severity | undefined;
  private readonly _type: AnnotationType | undefined;
  private readonly _link: string | undefined;
  private readonly _externalId: string | undefined;

  private constructor(props: AnnotationProps) {
    this._path = props.path;
    this._line = props.line;
    this._message = props.message;
    this._severity = props.severity;
    this._type = props.type;
    this._link = props.link;
    this._externalId = props.externalId;
  }

  /**
   * Create an annotation. `path` is relative to the repository root and
   * `line` is 1-based. `externalId` is not used by Bitbucket; it lets the
   * caller find the annotation again to update or delete it.
   */
  static create(props: AnnotationProps): Annotation {
    return new Annotation({
      path: requireText('path', props.path),
      line: requirePositiveInteger('line', props.line),
      message: requireText('message', props.message, FIELD_LIMITS.annotationMessage),
      severity: props.severity,
      type: props.type,
      link: optionalUrl('link', props.link),
      externalId: optionalText('externalId', props.externalId, FIELD_LIMITS.annotationExternalId),
    });
  }

  get path(): string {
    return this._path;
  }

  get line(): number {
    return this._line;
  }

  get message(): string {
    return this._message;
  }

  get severity(): Severity | undefined {
    return this._severity;
  }

  get type(): AnnotationType | undefined {
    return this._type;
  }

  get link(): string | undefined {
    return this._link;
  }

  get externalId(): string | undefined {
    return this._externalId;
  }

  equals(other: Annotation): boolean {
    return (
      this._path === other.path &&
      this._line === other.line &&
      this._message === other.message &&
      this._severity === other.severity &&
      this._type === other.type &&
      this._link === other.link &&
      this._externalId === other.externalId
    );
  }
}
