/**
 * Repository Exports
 */

export {
  createContentRepository,
  toRecordFields,
  fromRecordFields,
  type ContentRepository,
} from "./content.repository.js";
