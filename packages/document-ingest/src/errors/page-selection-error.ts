import { ConversionError } from '@bookpack/shared';

/**
 * PageSelectionError
 *
 * Thrown when a page-range string is malformed or selects pages the
 * document does not have.
 */
export class PageSelectionError extends ConversionError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'configuration', options);
    this.name = 'PageSelectionError';
  }
}
