/**
 * Connection Module - Static Credential Provider
 *
 * For keys supplied through configuration. Login flows that mint temporary
 * credentials implement CredentialProvider themselves.
 */
import type { Credentials } from "../signer/index.js";
import type { BrokerCredentials, CredentialProvider } from "./schema.js";

/**
 * Always hands out the same credentials for the given broker.
 *
 * @example
 * const credentials = createStaticCredentialProvider(keys, "broker.example", "us-east-1");
 */
export function createStaticCredentialProvider(
  credentials: Credentials,
  endpoint: string,
  region: string,
): CredentialProvider {
  const value: BrokerCredentials = Object.freeze({ ...credentials, endpoint, region });
  return {
    getCredentials: async () => value,
  };
}
