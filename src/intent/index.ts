export { IntentRepository } from "./repository.js";
export {
  intentDocumentSchema,
  ROLE_DEFAULT_TIERS,
  type IntentDocument,
  type IntentDocumentInput,
} from "./schema.js";
