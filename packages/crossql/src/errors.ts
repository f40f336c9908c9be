/**
 * Custom error classes for crossql.
 * Each carries actionable suggestions alongside the message.
 */

function formatMessage(message: string, suggestions: string[]): string {
  return `${message}\n\nSuggested fixes:\n${suggestions.map(s => `  • ${s}`).join('\n')}`;
}

/**
 * Error thrown when the source catalog cannot be loaded or fails validation.
 *
 * Common causes:
 * - CATALOG_PATH points at a missing or unreadable file
 * - The file is not valid JSON
 * - A source is missing its fallback statement or a template has no statement
 * - Two sources share a name
 */
export class CatalogError extends Error {
  public readonly suggestions: string[];

  constructor(message: string, suggestions?: string[]) {
    const suggestionList = suggestions || CatalogError.getDefaultSuggestions();
    super(formatMessage(message, suggestionList));
    this.name = 'CatalogError';
    this.suggestions = suggestionList;
    Object.setPrototypeOf(this, CatalogError.prototype);
  }

  private static getDefaultSuggestions(): string[] {
    return [
      'Check that CATALOG_PATH points at a readable JSON file',
      'Validate the catalog against the bundled catalog/default-catalog.json',
      'Ensure every source defines a fallback and a comparison default statement',
    ];
  }
}

/**
 * Error thrown when an operation names a source the catalog does not define.
 */
export class UnknownSourceError extends Error {
  public readonly source: string;
  public readonly available: string[];
  public readonly suggestions: string[];

  constructor(source: string, available: string[]) {
    const suggestionList = [
      `Use one of: ${available.join(', ')}`,
      'Call the "databases" tool to list configured sources',
    ];
    super(formatMessage(`Unknown database: ${source}`, suggestionList));
    this.name = 'UnknownSourceError';
    this.source = source;
    this.available = available;
    this.suggestions = suggestionList;
    Object.setPrototypeOf(this, UnknownSourceError.prototype);
  }
}
