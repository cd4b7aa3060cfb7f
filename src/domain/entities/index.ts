export { Report, ReportProps, ReportResult } from './Report';
export { Annotation, AnnotationProps, AnnotationType, Severity } from './Annotation';
export { AnnotationBatch } from './AnnotationBatch';
