import type { JsonValue } from '../../types';
import type { PageDocument } from '../page-document';
import { EmbeddedJsonStrategy } from './embedded-json.strategy';
import { tryParseJson, walkObjects, getField } from '../../utils/json-tree';
import { isJsonObject } from '../../utils/normalizers';

const SHARED_DATA_SELECTOR = 'script[data-zrr-shared-data-key]';

// Shared-data scripts wrap their JSON in an HTML comment
function stripCommentMarkers(raw: string): string {
  return raw.replace(/<!--/g, '').replace(/-->/g, '');
}

/**
 * ZillowStrategy
 * Handles Zillow detail pages. Property data lives in several script
 * payloads, and the Apollo caches hold it again as JSON-encoded strings.
 */
export class ZillowStrategy extends EmbeddedJsonStrategy {
  readonly name = 'Zillow';
  protected readonly platform = 'zillow' as const;

  protected loadPayloads(page: PageDocument): JsonValue[] {
    const payloads = this.profile.scriptSelectors.flatMap((selector) =>
      selector === SHARED_DATA_SELECTOR ? page.jsonBlocks(selector, stripCommentMarkers) : page.jsonBlocks(selector)
    );

    const expanded: JsonValue[] = [];
    for (const payload of payloads) {
      expanded.push(payload, ...this.expandCaches(payload));
    }
    return expanded;
  }

  /**
   * Decode JSON strings held under the cache keys. A cache may itself be a
   * string, or an object whose entries are strings; both levels are decoded.
   */
  private expandCaches(payload: JsonValue): JsonValue[] {
    const decoded: JsonValue[] = [];

    walkObjects(payload, (node) => {
      for (const key of this.profile.nestedJsonKeys) {
        const cache = getField(node, key);
        const root = typeof cache === 'string' ? tryParseJson(cache) : cache;
        if (root === null || root === undefined) continue;

        if (typeof cache === 'string') {
          decoded.push(root);
        }
        if (isJsonObject(root)) {
          for (const entry of Object.values(root)) {
            if (typeof entry !== 'string') continue;
            const parsed = tryParseJson(entry);
            if (parsed !== null) decoded.push(parsed);
          }
        }
      }
    });

    return decoded;
  }
}
