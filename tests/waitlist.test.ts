import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { WaitlistManager, DEFAULT_WELCOME_MESSAGE, type RoleGateway } from "../src/lib/waitlist.js";
import { configureLogging } from "../src/lib/logger.js";

const ROLE_ID = "900";

function fakeGateway() {
  return {
    assignRole: vi.fn(async (_userId: string, _roleId: string) => {}),
    sendDirectMessage: vi.fn(async (_userId: string, _text: string) => {}),
  } satisfies RoleGateway;
}

describe("WaitlistManager", () => {
  let tmpDir: string;
  let filePath: string;

  beforeAll(() => {
    configureLogging({ console: false });
  });

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "waitlist-test-"));
    filePath = path.join(tmpDir, "waitlist.json");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("assigns the configured role once and sends the welcome message", async () => {
    const gateway = fakeGateway();
    const waitlist = new WaitlistManager({ gateway, roleId: ROLE_ID, filePath });

    await expect(waitlist.onWaitlistTrigger("42")).resolves.toEqual({ ok: true });
    expect(gateway.assignRole).toHaveBeenCalledTimes(1);
    expect(gateway.assignRole).toHaveBeenCalledWith("42", ROLE_ID);
    expect(gateway.sendDirectMessage).toHaveBeenCalledWith("42", DEFAULT_WELCOME_MESSAGE);
  });

  it("does not retry a failed role assignment", async () => {
    const gateway = fakeGateway();
    gateway.assignRole.mockRejectedValue(new Error("Missing Permissions"));
    const waitlist = new WaitlistManager({ gateway, roleId: ROLE_ID, filePath });

    await expect(waitlist.onWaitlistTrigger("42")).resolves.toEqual({ ok: false, error: "Missing Permissions" });
    expect(gateway.assignRole).toHaveBeenCalledTimes(1);
    expect(gateway.sendDirectMessage).not.toHaveBeenCalled();
  });

  it("still reports success when the direct message fails", async () => {
    const gateway = fakeGateway();
    gateway.sendDirectMessage.mockRejectedValue(new Error("Cannot send messages to this user"));
    const waitlist = new WaitlistManager({ gateway, roleId: ROLE_ID, filePath, welcomeMessage: "Welcome!" });

    await expect(waitlist.onWaitlistTrigger("42")).resolves.toEqual({ ok: true });
    expect(gateway.sendDirectMessage).toHaveBeenCalledWith("42", "Welcome!");
  });

  it("records joining members once and persists the list", async () => {
    const gateway = fakeGateway();
    const waitlist = new WaitlistManager({ gateway, roleId: ROLE_ID, filePath });

    await waitlist.onMemberJoin("1");
    await waitlist.onMemberJoin("2");
    await waitlist.onMemberJoin("1");

    expect(waitlist.members()).toEqual(["1", "2"]);
    expect(JSON.parse(fs.readFileSync(filePath, "utf-8"))).toEqual(["1", "2"]);
    expect(gateway.assignRole).toHaveBeenCalledTimes(3);

    const reloaded = new WaitlistManager({ gateway, roleId: ROLE_ID, filePath });
    expect(reloaded.has("2")).toBe(true);
  });

  it("starts empty from an unreadable waitlist file", () => {
    fs.writeFileSync(filePath, "{broken");
    const waitlist = new WaitlistManager({ gateway: fakeGateway(), roleId: ROLE_ID, filePath });
    expect(waitlist.members()).toEqual([]);
  });

  it("grants the role to members who lack it, skipping bots", async () => {
    const gateway = fakeGateway();
    gateway.assignRole.mockImplementation(async (userId: string) => {
      if (userId === "3") throw new Error("Unknown Member");
    });
    const waitlist = new WaitlistManager({ gateway, roleId: ROLE_ID, filePath });

    const granted = await waitlist.processWaitlist([
      { userId: "1", roleIds: [] },
      { userId: "2", roleIds: [ROLE_ID] },
      { userId: "3", roleIds: ["1"] },
      { userId: "4", roleIds: [], bot: true },
    ]);

    expect(granted).toBe(1);
    expect(gateway.assignRole.mock.calls.map(([userId]) => userId)).toEqual(["1", "3"]);
    expect(waitlist.members()).toEqual(["1", "3"]);
  });
});
