import { DataField, DataType, DataValueMap, describeJsonType, isDataValue, Report, SchemaError } from '../../domain';
import { DATA_FIELD_KEYS, DataFieldDto, REPORT_KEYS, ReportDto } from '../dto';
import { createLogger, Logger } from '../logging';
import { ISerializer } from './ISerializer';
import { build, joinPath, readDto } from './documents';

export class ReportSerializer implements ISerializer<Report, ReportDto> {
  constructor(private readonly logger: Logger = createLogger('ReportSerializer')) {}

  serialize(report: Report): ReportDto {
    const dto: ReportDto = { title: report.title };

    if (report.details !== undefined) dto.details = report.details;
    if (report.result !== undefined) dto.result = report.result;
    if (report.data !== undefined) dto.data = report.data.map((field) => this.serializeDataField(field));
    if (report.reporter !== undefined) dto.reporter = report.reporter;
    if (report.link !== undefined) dto.link = report.link;
    if (report.logoUrl !== undefined) dto.logoUrl = report.logoUrl;
    if (report.createdDate !== undefined) dto.createdDate = report.createdDate.getTime();

    this.logger.debug(`Serialized report "${report.title}" (${Object.keys(dto).join(', ')})`);
    return dto;
  }

  deserialize(document: unknown, path = ''): Report {
    try {
      const dto = readDto(ReportDto, document, REPORT_KEYS, path);
      const data = dto.data?.map((entry, i) => this.deserializeDataField(entry, joinPath(path, `data[${i}]`)));

      return build(path, () =>
        Report.create({
          title: dto.title,
          details: dto.details,
          result: dto.result,
          data,
          reporter: dto.reporter,
          link: dto.link,
          logoUrl: dto.logoUrl,
          createdDate: dto.createdDate === undefined ? undefined : new Date(dto.createdDate),
        }),
      );
    } catch (error) {
      if (error instanceof SchemaError) {
        this.logger.debug(`Rejected report document: ${error.message}`);
      }
      throw error;
    }
  }

  private serializeDataField(field: DataField): DataFieldDto {
    return { title: field.title, type: field.type, value: field.value };
  }

  private deserializeDataField(entry: unknown, path: string): DataField {
    const dto = readDto(DataFieldDto, entry, DATA_FIELD_KEYS, path);
    return readDataValue(dto.title, dto.type, dto.value, path);
  }
}

function readDataValue<K extends DataType>(title: string, type: K, value: unknown, path: string): DataField<K> {
  if (!isDataValue(type, value)) {
    throw new SchemaError(
      joinPath(path, 'value'),
      'type-mismatch',
      `a ${type} data field cannot hold a ${describeJsonType(value)} value`,
    );
  }
  const checked: DataValueMap[K] = value;
  return build(path, () => DataField.create(title, type, checked));
}
