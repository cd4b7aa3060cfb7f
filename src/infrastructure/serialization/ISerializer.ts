/**
 * Port between a domain value and its JSON wire document.
 */
export interface ISerializer<TValue, TDocument> {
  /**
   * Build the wire document. Optional fields that are unset produce no key.
   */
  serialize(value: TValue): TDocument;

  /**
   * Read an already-parsed JSON value. `path` prefixes field names in
   * errors when the document is nested inside another one.
   *
   * @throws SchemaError when the document does not match the schema
   */
  deserialize(document: unknown, path?: string): TValue;
}
