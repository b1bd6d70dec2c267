import { EmbeddedJsonStrategy } from './embedded-json.strategy';

/**
 * RedfinStrategy
 * Handles Redfin detail pages (`__NEXT_DATA__` payload)
 */
export class RedfinStrategy extends EmbeddedJsonStrategy {
  readonly name = 'Redfin';
  protected readonly platform = 'redfin' as const;
  protected readonly recoversPriceFromText = true;
}
