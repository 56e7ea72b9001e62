import { describe, expect, it } from "vitest";
import { resolveCredentials } from "../credentials.js";

describe("resolveCredentials", () => {
  const env = { TELEGRAM_BOT_TOKEN: "env-token", TELEGRAM_CHAT_ID: "987654321" };

  it("prefers explicit flags over the environment", () => {
    const creds = resolveCredentials({ token: "flag-token", chatId: "123456789" }, env);

    expect(creds).toEqual({
      botToken: "flag-token",
      chatId: "123456789",
      sources: { botToken: "flag", chatId: "flag" },
    });
  });

  it("falls back to the environment per value", () => {
    const creds = resolveCredentials({ chatId: "123456789" }, env);

    expect(creds.botToken).toBe("env-token");
    expect(creds.chatId).toBe("123456789");
    expect(creds.sources).toEqual({ botToken: "env", chatId: "flag" });
  });

  it("treats blank flags as absent", () => {
    const creds = resolveCredentials({ token: "   ", chatId: "" }, env);

    expect(creds.botToken).toBe("env-token");
    expect(creds.chatId).toBe("987654321");
  });

  it("returns empty values when nothing is configured", () => {
    const creds = resolveCredentials({}, { TELEGRAM_BOT_TOKEN: "  " });

    expect(creds).toEqual({
      botToken: "",
      chatId: "",
      sources: { botToken: "missing", chatId: "missing" },
    });
  });

  it("trims surrounding whitespace", () => {
    const creds = resolveCredentials({ token: " flag-token\n" }, { TELEGRAM_CHAT_ID: " 42 " });

    expect(creds.botToken).toBe("flag-token");
    expect(creds.chatId).toBe("42");
  });
});
