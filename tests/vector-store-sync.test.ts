import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { VectorStoreSync, isKnowledgeFile, listKnowledgeFiles, type VectorStoreApi } from "../src/lib/vector-store-sync.js";
import { ConversationStore } from "../src/lib/conversation-store.js";
import { configureLogging } from "../src/lib/logger.js";

function fakeApi() {
  let uploads = 0;
  return {
    newestVectorStore: vi.fn(async (): Promise<string | null> => "vs_old"),
    uploadFile: vi.fn(async (_filePath: string) => `file_${++uploads}`),
    createVectorStore: vi.fn(async (_name: string, _fileIds: string[]) => "vs_new"),
    deleteVectorStore: vi.fn(async (_id: string) => {}),
    linkToAssistant: vi.fn(async (_assistantId: string, _vectorStoreId: string) => {}),
  } satisfies VectorStoreApi;
}

describe("isKnowledgeFile", () => {
  it("excludes backups, locks and temp files", () => {
    expect(isKnowledgeFile("faq.json")).toBe(true);
    expect(isKnowledgeFile("guide.md")).toBe(true);
    expect(isKnowledgeFile("faq.json.20240101_100000.bak")).toBe(false);
    expect(isKnowledgeFile("faq.json.lock")).toBe(false);
    expect(isKnowledgeFile(".faq.json.tmp-123-456")).toBe(false);
  });
});

describe("VectorStoreSync", () => {
  let tmpDir: string;
  let knowledgeDir: string;
  let conversations: ConversationStore;

  beforeAll(() => {
    configureLogging({ console: false });
  });

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "vector-test-"));
    knowledgeDir = path.join(tmpDir, "vector_store");
    fs.mkdirSync(knowledgeDir);
    fs.writeFileSync(path.join(knowledgeDir, "faq.json"), '{"FAQ": []}');
    fs.writeFileSync(path.join(knowledgeDir, "guide.md"), "# Guide");
    fs.writeFileSync(path.join(knowledgeDir, "faq.json.20240101_100000.bak"), "{}");
    fs.mkdirSync(path.join(knowledgeDir, "nested"));
    conversations = new ConversationStore(path.join(tmpDir, "threads.json"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("lists only top-level knowledge files", () => {
    expect(listKnowledgeFiles(knowledgeDir)).toEqual([
      path.join(knowledgeDir, "faq.json"),
      path.join(knowledgeDir, "guide.md"),
    ]);
  });

  it("uploads, creates, links, deletes the old store and resets conversations", async () => {
    conversations.set("111", "thread_1");
    const api = fakeApi();
    const sync = new VectorStoreSync({ api, assistantId: "asst_test", knowledgeDir, conversations, storeName: "FAQ" });

    await expect(sync.refresh()).resolves.toBe("vs_new");

    expect(api.uploadFile.mock.calls.map(([file]) => path.basename(file))).toEqual(["faq.json", "guide.md"]);
    expect(api.createVectorStore).toHaveBeenCalledWith("FAQ", ["file_1", "file_2"]);
    expect(api.linkToAssistant).toHaveBeenCalledWith("asst_test", "vs_new");
    expect(api.deleteVectorStore).toHaveBeenCalledWith("vs_old");
    expect(conversations.get("111")).toBeNull();
  });

  it("keeps the old store when the new one cannot be linked", async () => {
    conversations.set("111", "thread_1");
    const api = fakeApi();
    api.linkToAssistant.mockRejectedValue(new Error("No such assistant"));
    const sync = new VectorStoreSync({ api, assistantId: "asst_test", knowledgeDir, conversations });

    await expect(sync.refresh()).resolves.toBeNull();
    expect(api.deleteVectorStore).not.toHaveBeenCalled();
    expect(conversations.get("111")).toBe("thread_1");
  });

  it("stops before creating a store when no file could be uploaded", async () => {
    const api = fakeApi();
    api.uploadFile.mockRejectedValue(new Error("401 Incorrect API key"));
    const sync = new VectorStoreSync({ api, assistantId: "asst_test", knowledgeDir });

    await expect(sync.refresh()).resolves.toBeNull();
    expect(api.uploadFile).toHaveBeenCalledTimes(2);
    expect(api.createVectorStore).not.toHaveBeenCalled();
  });

  it("carries on when listing or deleting old stores fails", async () => {
    const api = fakeApi();
    api.newestVectorStore.mockRejectedValue(new Error("timeout"));
    const sync = new VectorStoreSync({ api, assistantId: "asst_test", knowledgeDir });

    await expect(sync.refresh()).resolves.toBe("vs_new");
    expect(api.deleteVectorStore).not.toHaveBeenCalled();
  });

  it("does not delete a store that is also the new one", async () => {
    const api = fakeApi();
    api.newestVectorStore.mockResolvedValue("vs_new");
    const sync = new VectorStoreSync({ api, assistantId: "asst_test", knowledgeDir });

    await sync.refresh();
    expect(api.deleteVectorStore).not.toHaveBeenCalled();
  });
});
