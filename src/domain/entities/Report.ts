import { ValidationError } from '../errors';
import { DataField } from '../value-objects/DataField';
import { FIELD_LIMITS, optionalDate, optionalText, optionalUrl, requireText } from '../validation';

export const ReportResult = {
  Pass: 'PASS',
  Fail: 'FAIL',
} as const;

export type ReportResult = (typeof ReportResult)[keyof typeof ReportResult];

export interface ReportProps {
  title: string;
  details?: string;
  result?: ReportResult;
  data?: readonly DataField[];
  reporter?: string;
  link?: string;
  logoUrl?: string;
  createdDate?: Date;
}

/**
 * A Code Insights report: the summary of one analysis run attached to a
 * commit. Annotations are submitted separately under the same report key
 * and are not part of this value.
 */
export class Report {
  private readonly _title: string;
  private readonly _details: string | undefined;
  private readonly _result: ReportResult | undefined;
  private readonly _data: readonly DataField[] | undefined;
  private readonly _reporter: string | undefined;
  private readonly _link: string | undefined;
  private readonly _logoUrl: string | undefined;
  private readonly _createdDate: Date | undefined;

  private constructor(props: ReportProps) {
    this._title = props.title;
    this._details = props.details;
    this._result = props.result;
    this._data = props.data;
    this._reporter = props.reporter;
    this._link = props.link;
    this._logoUrl = props.logoUrl;
    this._createdDate = props.createdDate;
  }

  /**
   * Create a report. Every optional property may be left out; it is then
   * absent from the serialized document as well.
   *
   * Bitbucket limits the title and reporter to 450 characters, the details
   * to 2000 characters and the data fields to 6 entries.
   */
  static create(props: ReportProps): Report {
    let data: readonly DataField[] | undefined;
    if (props.data !== undefined) {
      if (props.data.length > FIELD_LIMITS.reportDataFields) {
        throw new ValidationError(
          'data',
          `at most ${FIELD_LIMITS.reportDataFields} data fields are allowed, got ${props.data.length}`,
        );
      }
      data = Object.freeze([...props.data]);
    }

    return new Report({
      title: requireText('title', props.title, FIELD_LIMITS.reportTitle),
      details: optionalText('details', props.details, FIELD_LIMITS.reportDetails),
      result: props.result,
      data,
      reporter: optionalText('reporter', props.reporter, FIELD_LIMITS.reportReporter),
      link: optionalUrl('link', props.link),
      logoUrl: optionalUrl('logoUrl', props.logoUrl),
      createdDate: optionalDate('createdDate', props.createdDate),
    });
  }

  get title(): string {
    return this._title;
  }

  get details(): string | undefined {
    return this._details;
  }

  get result(): ReportResult | undefined {
    return this._result;
  }

  get data(): readonly DataField[] | undefined {
    return this._data;
  }

  get reporter(): string | undefined {
    return this._reporter;
  }

  get link(): string | undefined {
    return this._link;
  }

  get logoUrl(): string | undefined {
    return this._logoUrl;
  }

  get createdDate(): Date | undefined {
    // Date is mutable; hand out a copy
    return this._createdDate ? new Date(this._createdDate.getTime()) : undefined;
  }

  equals(other: Report): boolean {
    return (
      this._title === other.title &&
      this._details === other.details &&
      this._result === other.result &&
      this._reporter === other.reporter &&
      this._link === other.link &&
      this._logoUrl === other.logoUrl &&
      this._createdDate?.getTime() === other.createdDate?.getTime() &&
      sameData(this._data, other.data)
    );
  }
}

function sameData(a: readonly DataField[] | undefined, b: readonly DataField[] | undefined): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return a.length === b.length && a.every((field, i) => field.equals(b[i]));
}
