export { DataField, DataType, isDataValue, DataLink, DataValue, DataValueMap } from './DataField';
