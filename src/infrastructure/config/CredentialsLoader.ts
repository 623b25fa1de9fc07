import { promises as fs } from "fs";
import { ServiceAccountCredentials } from "../../domain/value-objects/ServiceAccountCredentials";
import { CredentialsError } from "../../domain/errors/ShipperErrors";

export async function loadServiceAccountCredentials(
  filePath: string
): Promise<ServiceAccountCredentials> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new CredentialsError(
      `Unable to read credentials file ${filePath}`,
      "unreadable",
      error instanceof Error ? error : undefined
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new CredentialsError(
      `Invalid JSON in credentials file ${filePath}`,
      "malformed",
      error instanceof Error ? error : undefined
    );
  }

  return ServiceAccountCredentials.fromJSON(raw);
}
