import pino from "pino";
import { publishBatch } from "../src/publisher.js";

const { getFilesMock, publishMessageMock, closeMock } = vi.hoisted(() => ({
  getFilesMock: vi.fn(),
  publishMessageMock: vi.fn(),
  closeMock: vi.fn(),
}));

vi.mock("@google-cloud/storage", () => {
  return {
    Storage: class MockStorage {
      bucket() {
        return { getFiles: getFilesMock };
      }
    },
  };
});

vi.mock("@google-cloud/pubsub", () => {
  return {
    PubSub: class MockPubSub {
      topic() {
        return { publishMessage: publishMessageMock };
      }
      getProjectId() {
        return Promise.resolve("unused");
      }
      close() {
        return closeMock();
      }
    },
  };
});

describe("publishBatch with its own clients", () => {
  const params = { projectId: "dapla-kildomaten-p-zz", bucketId: "ssb-dapla-kildomaten-data-kilde-prod", prefix: "felles/kilde1", topicId: "update-kilde1" };
  const logger = pino({ level: "silent" });

  beforeEach(() => {
    getFilesMock.mockReset();
    publishMessageMock.mockReset();
    closeMock.mockReset();
    closeMock.mockResolvedValue(undefined);
  });

  it("closes the Pub/Sub client after the batch", async () => {
    getFilesMock.mockResolvedValue([[{ name: "felles/kilde1/a.csv" }, { name: "felles/kilde1/b.csv" }]]);
    publishMessageMock.mockResolvedValue("m-1");
    const summary = await publishBatch(params, { logger, timeoutMs: 1000 });
    expect(summary).toMatchObject({
      topicPath: "projects/dapla-kildomaten-p-zz/topics/update-kilde1",
      published: 2,
    });
    expect(closeMock).toHaveBeenCalledTimes(1);
  });

  it("closes the client even when every publish fails", async () => {
    getFilesMock.mockResolvedValue([[{ name: "felles/kilde1/a.csv" }]]);
    publishMessageMock.mockRejectedValue(new Error("NOT_FOUND: topic"));
    const summary = await publishBatch(params, { logger, timeoutMs: 1000 });
    expect(summary.failed).toBe(1);
    expect(closeMock).toHaveBeenCalledTimes(1);
  });

  it("does not open a Pub/Sub client for an empty prefix", async () => {
    getFilesMock.mockResolvedValue([[]]);
    await expect(publishBatch(params, { logger, timeoutMs: 1000 })).rejects.toMatchObject({ code: "EMPTY_BATCH" });
    expect(closeMock).not.toHaveBeenCalled();
  });
});
