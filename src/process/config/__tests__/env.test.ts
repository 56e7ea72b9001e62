import os from "os";
import path from "path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadProjectDotenv } from "../env.js";

describe("loadProjectDotenv", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "tg-notify-env-"));
  });

  afterEach(async () => {
    delete process.env.TG_NOTIFY_TEST_ONLY_A;
    delete process.env.TG_NOTIFY_TEST_ONLY_B;
    await fs.remove(tmpDir);
  });

  it("fills unset variables from .env without overriding existing ones", async () => {
    await fs.writeFile(
      path.join(tmpDir, ".env"),
      "TG_NOTIFY_TEST_ONLY_A=from-file\nTG_NOTIFY_TEST_ONLY_B=from-file\n",
    );
    process.env.TG_NOTIFY_TEST_ONLY_B = "from-shell";

    loadProjectDotenv(tmpDir);

    expect(process.env.TG_NOTIFY_TEST_ONLY_A).toBe("from-file");
    expect(process.env.TG_NOTIFY_TEST_ONLY_B).toBe("from-shell");
  });

  it("does nothing when there is no .env", () => {
    loadProjectDotenv(tmpDir);

    expect(process.env.TG_NOTIFY_TEST_ONLY_A).toBeUndefined();
  });
});
