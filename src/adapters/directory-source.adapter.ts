import path from "path";
import { ReviewPageRequest, ReviewSource } from "../domain/types";
import { readFileIfExists } from "../integrations/storage/atomic-file";

/**
 * Serves captured page payloads from `<dir>/<entity_id>/page-<n>.json`.
 * A missing page file reads as an empty page, which ends pagination.
 */
export function createDirectoryReviewSource(dir: string): ReviewSource {
  return {
    async fetchPage({ entityId, page }: ReviewPageRequest): Promise<unknown> {
      if (entityId !== path.basename(entityId) || entityId.startsWith(".")) {
        throw new Error(`entity id cannot be used as a directory name: ${entityId}`);
      }
      const file = path.join(dir, entityId, `page-${page}.json`);
      const text = await readFileIfExists(file);
      if (text === null) return [];
      try {
        const payload: unknown = JSON.parse(text);
        return payload;
      } catch {
        // Handed on as-is so the page adapter reports it as a parse failure
        return text;
      }
    },
  };
}

export default createDirectoryReviewSource;
