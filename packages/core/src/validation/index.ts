export { isValidIdentifier, normalizeIdentifier } from "./identifier";
