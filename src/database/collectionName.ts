import { ConfigurationError } from "../errors";

const COLLECTION_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Collection names end up as SQL identifiers, so only plain identifiers pass. */
export function assertCollectionName(name: string): void {
    if (!COLLECTION_NAME.test(name)) {
        throw new ConfigurationError(`Collection name "${name}" must be a plain identifier.`);
    }
}
