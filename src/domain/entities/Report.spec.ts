import { ValidationError } from '../errors';
import { DataField } from '../value-objects/DataField';
import { Report, ReportResult } from './Report';

describe('Report', () => {
  describe('create', () => {
    it('should create a report with only a title', () => {
      const report = Report.create({ title: 'Lint results' });

      expect(report.title).toBe('Lint results');
      expect(report.details).toBeUndefined();
      expect(report.result).toBeUndefined();
      expect(report.data).toBeUndefined();
      expect(report.reporter).toBeUndefined();
      expect(report.link).toBeUndefined();
      expect(report.logoUrl).toBeUndefined();
      expect(report.createdDate).toBeUndefined();
    });

    it('should keep every optional field that is set', () => {
      const report = Report.create({
        title: 'Coverage',
        details: 'Line coverage of the main module',
        result: ReportResult.Pass,
        data: [DataField.percentage('Coverage', 87.5)],
        reporter: 'coverage-bot',
        link: 'https://ci.example.com/builds/12',
        logoUrl: 'https://ci.example.com/logo.svg',
        createdDate: new Date(1700000000000),
      });

      expect(report.details).toBe('Line coverage of the main module');
      expect(report.result).toBe('PASS');
      expect(report.data).toHaveLength(1);
      expect(report.reporter).toBe('coverage-bot');
      expect(report.link).toBe('https://ci.example.com/builds/12');
      expect(report.logoUrl).toBe('https://ci.example.com/logo.svg');
      expect(report.createdDate?.getTime()).toBe(1700000000000);
    });

    it('should reject an empty title', () => {
      expect(() => Report.create({ title: '   ' })).toThrow(ValidationError);
    });

    it('should reject a title longer than 450 characters', () => {
      expect(() => Report.create({ title: 'x'.repeat(451) })).toThrow(
        'title: length 451 is longer than the allowed limit 450',
      );
      expect(Report.create({ title: 'x'.repeat(450) }).title).toHaveLength(450);
    });

    it('should count characters rather than UTF-16 units against the limit', () => {
      const title = '\u{1F600}'.repeat(450);

      expect(Report.create({ title }).title).toBe(title);
      expect(() => Report.create({ title: '\u{1F600}'.repeat(451) })).toThrow(
        'title: length 451 is longer than the allowed limit 450',
      );
    });

    it('should reject details longer than 2000 characters', () => {
      expect(() => Report.create({ title: 'Lint', details: 'd'.repeat(2001) })).toThrow(ValidationError);
    });

    it('should reject more than 6 data fields', () => {
      const data = [1, 2, 3, 4, 5, 6, 7].map((n) => DataField.number(`Metric ${n}`, n));

      expect(() => Report.create({ title: 'Lint', data })).toThrow(
        'data: at most 6 data fields are allowed, got 7',
      );
    });

    it('should reject a link that is not an http URL', () => {
      let caught: unknown;
      try {
        Report.create({ title: 'Lint', link: 'not a url' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught).toMatchObject({ field: 'link' });
    });

    it('should reject an invalid created date', () => {
      expect(() => Report.create({ title: 'Lint', createdDate: new Date(Number.NaN) })).toThrow(
        'createdDate: must be a valid date',
      );
    });
  });

  describe('immutability', () => {
    it('should not be affected by changes to the input data array', () => {
      const data = [DataField.number('Errors', 3)];
      const report = Report.create({ title: 'Lint', data });

      data.push(DataField.number('Warnings', 5));

      expect(report.data).toHaveLength(1);
      expect(Object.isFrozen(report.data)).toBe(true);
    });

    it('should hand out copies of the created date', () => {
      const report = Report.create({ title: 'Lint', createdDate: new Date(1000) });

      report.createdDate?.setTime(2000);

      expect(report.createdDate?.getTime()).toBe(1000);
    });
  });

  describe('equals', () => {
    it('should compare all fields including data', () => {
      const build = (errors: number) =>
        Report.create({
          title: 'Lint',
          result: ReportResult.Fail,
          data: [DataField.number('Errors', errors)],
          createdDate: new Date(5000),
        });

      expect(build(3).equals(build(3))).toBe(true);
      expect(build(3).equals(build(4))).toBe(false);
      expect(build(3).equals(Report.create({ title: 'Lint', result: ReportResult.Fail }))).toBe(false);
    });
  });
});
