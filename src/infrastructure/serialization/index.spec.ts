import { Annotation, AnnotationBatch, DataField, Report, ReportResult, SchemaError } from '../../domain';
import {
  deserializeAnnotation,
  parseAnnotation,
  parseAnnotationBatch,
  parseReport,
  serialize,
  toJson,
} from './index';

describe('serialization', () => {
  const report = Report.create({
    title: 'Lint results',
    result: ReportResult.Fail,
    data: [DataField.number('Errors', 3)],
  });
  const annotation = Annotation.create({ path: 'src/main.rs', line: 42, message: 'unused variable' });

  describe('serialize', () => {
    it('should pick the serializer from the value', () => {
      expect(serialize(report)).toEqual({
        title: 'Lint results',
        result: 'FAIL',
        data: [{ title: 'Errors', type: 'NUMBER', value: 3 }],
      });
      expect(serialize(annotation)).toEqual({ path: 'src/main.rs', line: 42, message: 'unused variable' });
      expect(serialize(AnnotationBatch.create([annotation]))).toEqual({
        annotations: [{ path: 'src/main.rs', line: 42, message: 'unused variable' }],
      });
    });

    it('should always produce the same document for the same value', () => {
      expect(toJson(report, 0)).toBe(toJson(report, 0));
    });
  });

  describe('toJson', () => {
    it('should produce a compact body', () => {
      expect(toJson(annotation, 0)).toBe('{"path":"src/main.rs","line":42,"message":"unused variable"}');
    });

    it('should indent when asked to', () => {
      expect(toJson(annotation, 2)).toBe(
        '{\n  "path": "src/main.rs",\n  "line": 42,\n  "message": "unused variable"\n}',
      );
    });
  });

  describe('parse', () => {
    it('should read back what toJson wrote', () => {
      expect(parseReport(toJson(report, 0))).toEqual(report);
      expect(parseAnnotation(toJson(annotation, 0))).toEqual(annotation);

      const batch = AnnotationBatch.create([annotation]);
      expect(parseAnnotationBatch(toJson(batch, 0)).equals(batch)).toBe(true);
    });

    it('should report malformed JSON text', () => {
      let caught: unknown;
      try {
        parseReport('{"title": ');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(SchemaError);
      expect(caught).toMatchObject({ field: '$', kind: 'invalid-json' });
    });

    it('should reject an unknown result token in JSON text', () => {
      expect(() => parseReport('{"title":"Lint results","result":"unknown"}')).toThrow(SchemaError);
    });
  });

  describe('deserializeAnnotation', () => {
    it('should accept line 1', () => {
      expect(deserializeAnnotation({ path: 'src/main.rs', line: 1, message: 'm' }).line).toBe(1);
    });
  });
});
