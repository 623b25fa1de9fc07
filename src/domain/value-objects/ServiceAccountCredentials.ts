import { z } from "zod";
import { CredentialsError } from "../errors/ShipperErrors";

const credentialsSchema = z.object({
  type: z.string(),
  project_id: z.string().min(1),
  private_key_id: z.string(),
  private_key: z.string().min(1),
  client_email: z.string().min(1),
  client_id: z.string(),
  auth_uri: z.string(),
  token_uri: z.string().min(1),
  auth_provider_x509_cert_url: z.string(),
  client_x509_cert_url: z.string(),
});

export type ServiceAccountKeyFile = z.infer<typeof credentialsSchema>;

export class ServiceAccountCredentials {
  private constructor(private readonly key: Readonly<ServiceAccountKeyFile>) {}

  /**
   * Decodes a service-account key document. Only `type: "service_account"`
   * keys are accepted.
   */
  public static fromJSON(raw: unknown): ServiceAccountCredentials {
    const parsed = credentialsSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join(", ");
      throw new CredentialsError(`Malformed service account credentials: ${issues}`, "malformed");
    }
    if (parsed.data.type !== "service_account") {
      throw new CredentialsError(
        `Wrong credentials type: expected "service_account", got "${parsed.data.type}"`,
        "wrongCredentialsType"
      );
    }
    return new ServiceAccountCredentials(Object.freeze({ ...parsed.data }));
  }

  public get projectId(): string {
    return this.key.project_id;
  }

  public get privateKeyId(): string {
    return this.key.private_key_id;
  }

  public get privateKey(): string {
    return this.key.private_key;
  }

  public get clientEmail(): string {
    return this.key.client_email;
  }

  public get clientId(): string {
    return this.key.client_id;
  }

  public get tokenUri(): string {
    return this.key.token_uri;
  }

  public logName(logId: string): string {
    return `projects/${this.projectId}/logs/${encodeURIComponent(logId)}`;
  }
}
