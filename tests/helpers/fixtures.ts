import { generateKeyPairSync } from "crypto";
import { Logger } from "../../src/application/interfaces/Logger";
import { LogRecord } from "../../src/domain/entities/LogRecord";
import { Severity } from "../../src/domain/value-objects/Severity";
import { ServiceAccountKeyFile } from "../../src/domain/value-objects/ServiceAccountCredentials";

export function createMockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

let keyPair: { privateKey: string; publicKey: string } | undefined;

export function testKeyPair(): { privateKey: string; publicKey: string } {
  if (!keyPair) {
    keyPair = generateKeyPairSync("rsa", {
      modulusLength: 2048,
      privateKeyEncoding: { type: "pkcs8", format: "pem" },
      publicKeyEncoding: { type: "spki", format: "pem" },
    });
  }
  return keyPair;
}

export function serviceAccountKey(overrides: Partial<ServiceAccountKeyFile> = {}): ServiceAccountKeyFile {
  return {
    type: "service_account",
    project_id: "test-project",
    private_key_id: "test-key-id",
    private_key: testKeyPair().privateKey,
    client_email: "shipper@test-project.example.com",
    client_id: "1234567890",
    auth_uri: "https://auth.example.com/o/oauth2/auth",
    token_uri: "https://auth.example.com/token",
    auth_provider_x509_cert_url: "https://auth.example.com/certs",
    client_x509_cert_url: "https://auth.example.com/certs/shipper",
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<LogRecord> = {}): LogRecord {
  return {
    logName: "projects/test-project/logs/app",
    severity: Severity.INFO,
    textPayload: "hello",
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected function to throw");
}
