import type { Specification } from '@core/types/spec';

export interface IParserService {
  /**
   * Parse a YAML or JSON specification document.
   * @param content The document text
   * @param source Optional file path for error messages
   * @throws {SpecValidationError} If the document is malformed or does not describe a CLI
   */
  parse(content: string, source?: string): Specification;

  /**
   * Read and parse a specification file.
   * @throws {SpecValidationError} If the file cannot be read or parsed
   */
  parseFile(filePath: string): Promise<Specification>;
}
