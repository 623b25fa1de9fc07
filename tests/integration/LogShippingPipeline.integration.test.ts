import { promises as fs } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { LogShipper } from "../../src/LogShipper";
import { ShipperSettings } from "../../src/application/interfaces/ShipperSettings";
import { LogRecords } from "../../src/domain/entities/LogRecord";
import { Severity } from "../../src/domain/value-objects/Severity";
import { createMockLogger, jsonResponse, makeRecord, serviceAccountKey } from "../helpers/fixtures";

const TOKEN_URI = "https://auth.example.com/token";
const WRITE_ENDPOINT = "https://logging.example.com/v2/entries:write";

describe("Log shipping pipeline", () => {
  let directory: string;
  let credentialsFile: string;
  let queueFile: string;
  let logger: ReturnType<typeof createMockLogger>;
  let fetchSpy: jest.SpiedFunction<typeof fetch>;
  let writeStatus: number;
  let shipper: LogShipper | undefined;

  const writeRequests = (): { entries: Array<Record<string, unknown>> }[] =>
    fetchSpy.mock.calls
      .filter(([input]) => String(input) === WRITE_ENDPOINT)
      .map(([, init]) => JSON.parse(String(init?.body)));

  const start = (settings: Partial<ShipperSettings> = {}) =>
    LogShipper.setup({
      credentialsFile,
      queueFile,
      logger,
      endpoint: WRITE_ENDPOINT,
      settings: { includeSourceLocation: false, ...settings },
    });

  beforeEach(async () => {
    directory = await fs.mkdtemp(join(tmpdir(), "log-shipper-"));
    credentialsFile = join(directory, "key.json");
    queueFile = join(directory, "queue", "CloudLogEntries.jsonl");
    await fs.writeFile(credentialsFile, JSON.stringify(serviceAccountKey()));
    logger = createMockLogger();
    writeStatus = 200;
    fetchSpy = jest.spyOn(global, "fetch").mockImplementation(async (input) => {
      if (String(input) === TOKEN_URI) {
        return jsonResponse({ access_token: "test-token", expires_in: 3600, token_type: "Bearer" });
      }
      return writeStatus === 200
        ? jsonResponse({})
        : jsonResponse({ error: { code: writeStatus, message: "unavailable", status: "UNAVAILABLE" } }, writeStatus);
    });
  });

  afterEach(async () => {
    await shipper?.shutdown();
    shipper = undefined;
    jest.restoreAllMocks();
    await fs.rm(directory, { recursive: true, force: true });
  });

  it("should upload records left over from a previous run at startup", async () => {
    const leftover = makeRecord({ textPayload: "from last run" });
    await fs.mkdir(join(directory, "queue"));
    await fs.writeFile(queueFile, LogRecords.serialize(leftover) + "\n");

    shipper = await start();
    await shipper.flush();

    expect(writeRequests()).toEqual([
      {
        resource: { type: "global", labels: { project_id: "test-project" } },
        entries: [leftover],
      },
    ]);
    await expect(fs.readFile(queueFile, "utf8")).resolves.toBe("");
  });

  it("should upload immediately when a record reaches the signaling severity", async () => {
    shipper = await start();
    await shipper.flush();
    const handler = shipper.handler("app");

    handler.info("routine");
    handler.critical("disk on fire", { host: "edge-1" });
    await shipper.flush();

    const requests = writeRequests();
    expect(requests).toHaveLength(1);
    expect(requests[0].entries).toEqual([
      expect.objectContaining({
        logName: "projects/test-project/logs/app",
        severity: Severity.INFO,
        textPayload: "routine",
      }),
      expect.objectContaining({
        logName: "projects/test-project/logs/app",
        severity: Severity.CRITICAL,
        textPayload: "disk on fire",
        labels: { host: "edge-1" },
      }),
    ]);
    await expect(shipper.getStats()).resolves.toMatchObject({
      queue: { bytes: 0, lines: 0 },
      uploading: false,
      lastCycle: { status: "delivered", sent: 2 },
    });
  });

  it("should keep records queued while the backend is failing", async () => {
    writeStatus = 503;
    shipper = await start();
    await shipper.flush();

    shipper.handler("app").error("payment failed");
    await shipper.flush();
    shipper.upload();
    await shipper.flush();

    const stats = await shipper.getStats();
    expect(stats.queue.lines).toBe(1);
    expect(stats.lastCycle).toMatchObject({ status: "requeued", sent: 0 });

    writeStatus = 200;
    shipper.upload();
    await shipper.flush();

    await expect(shipper.getStats()).resolves.toMatchObject({
      queue: { lines: 0 },
      lastCycle: { status: "delivered", sent: 1 },
    });
  });

  it("should only upload on request when signaling is disabled", async () => {
    shipper = await start({ signalingSeverity: null });
    await shipper.flush();

    shipper.handler("app").emergency("still queued");
    await shipper.flush();
    expect(writeRequests()).toHaveLength(0);

    shipper.upload();
    await shipper.flush();
    expect(writeRequests()).toHaveLength(1);
  });

  it("should apply settings changes to records already queued", async () => {
    shipper = await start({ signalingSeverity: null });
    await shipper.flush();
    const handler = shipper.handler("app");
    handler.info("small");
    handler.info("x".repeat(500));
    await shipper.flush();

    shipper.updateSettings({ maxLogEntrySize: 300 });
    shipper.upload();
    await shipper.flush();

    const requests = writeRequests();
    expect(requests).toHaveLength(1);
    expect(requests[0].entries).toEqual([expect.objectContaining({ textPayload: "small" })]);
    expect(logger.warn).toHaveBeenCalledWith("Evicted oversized log records", {
      count: 1,
      maxLogEntrySize: 300,
    });
  });

  it("should drop records appended after shutdown", async () => {
    shipper = await start();
    await shipper.shutdown();

    shipper.append({
      logName: "projects/test-project/logs/app",
      severity: Severity.INFO,
      textPayload: "too late",
    });

    expect(logger.warn).toHaveBeenCalledWith("Log shipper is shut down, record dropped", {
      logName: "projects/test-project/logs/app",
    });
    await expect(fs.readFile(queueFile, "utf8")).resolves.toBe("");
  });
});
