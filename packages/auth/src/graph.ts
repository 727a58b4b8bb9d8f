import { Client, type AuthenticationProvider } from "@microsoft/microsoft-graph-client";
import { ClientSecretCredential, AzureAuthorityHosts, type TokenCredential } from "@azure/identity";

export type MsftCloud = "Public" | "AzureUSGovernment";

class CredentialAuthProvider implements AuthenticationProvider {
  constructor(
    private credential: TokenCredential,
    private scopes: string[]
  ) {}

  async getAccessToken(): Promise<string> {
    const token = await this.credential.getToken(this.scopes);
    if (!token) throw new Error(`no access token issued for ${this.scopes.join(" ")}`);
    return token.token;
  }
}

export function graphResourceFor(cloud: MsftCloud): string {
  return cloud === "AzureUSGovernment" ? "https://graph.microsoft.us" : "https://graph.microsoft.com";
}

export function makeGraphClient(params: {
  tenantId: string;
  clientId: string;
  clientSecret: string;
  cloud?: MsftCloud;
}): Client {
  const cloud = params.cloud ?? "Public";

  const authorityHost = cloud === "AzureUSGovernment"
    ? AzureAuthorityHosts.AzureGovernment
    : AzureAuthorityHosts.AzurePublicCloud;

  const credential = new ClientSecretCredential(
    params.tenantId,
    params.clientId,
    params.clientSecret,
    { authorityHost }
  );

  const graphResource = graphResourceFor(cloud);

  const authProvider = new CredentialAuthProvider(credential, [
    graphResource + "/.default",
  ]);

  return Client.initWithMiddleware({
    authProvider,
    baseUrl: graphResource,
    defaultVersion: "v1.0",
  });
}
