import { PassThrough, Readable } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import { loadConfig, parseRecipients, promptStdin } from "@/lib/config";
import { ConfigError } from "@/lib/errors";

const baseEnv = {
  SENDER_EMAIL: "sender@example.com",
  SENDER_PASSWORD: "test-secret",
  RECIPIENT_EMAILS: "a@example.com, b@example.com",
};

describe("promptStdin", () => {
  it("should resolve with the line typed on the input", async () => {
    const input = Readable.from(["sender@example.com\n"]);

    await expect(promptStdin("Sender email: ", input, new PassThrough())).resolves.toBe(
      "sender@example.com"
    );
  });

  it("should reject with ConfigError when the input ends before an answer", async () => {
    const input = Readable.from([]);

    await expect(promptStdin("Sender email: ", input, new PassThrough())).rejects.toThrow(
      new ConfigError('promptStdin: input closed before an answer to "Sender email:"')
    );
  });
});

describe("parseRecipients", () => {
  it("should trim entries and drop empty ones", () => {
    expect(parseRecipients(" a@example.com, ,b@example.com ,")).toEqual([
      "a@example.com",
      "b@example.com",
    ]);
  });

  it("should return an empty list for an empty string", () => {
    expect(parseRecipients("")).toEqual([]);
  });
});

describe("loadConfig", () => {
  it("should read credentials from the environment without prompting", async () => {
    const prompt = vi.fn();

    const config = await loadConfig(baseEnv, prompt);

    expect(prompt).not.toHaveBeenCalled();
    expect(config).toEqual({
      sourceUrl: "https://ipocentral.in/ipo-discussion/",
      format: "text",
      delivery: "email",
      subject: "Daily IPO GMP Summary",
      senderEmail: "sender@example.com",
      recipients: ["a@example.com", "b@example.com"],
      smtp: {
        host: "smtp.gmail.com",
        port: 587,
        user: "sender@example.com",
        password: "test-secret",
      },
    });
  });

  it("should prompt for missing credentials in order", async () => {
    const prompt = vi
      .fn()
      .mockResolvedValueOnce(" me@example.com ")
      .mockResolvedValueOnce("test-secret")
      .mockResolvedValueOnce("x@example.com,y@example.com");

    const config = await loadConfig({}, prompt);

    expect(prompt.mock.calls.map(([question]) => question)).toEqual([
      "Sender email: ",
      "Email password/App Password: ",
      "Recipient emails (comma separated): ",
    ]);
    expect(config.senderEmail).toBe("me@example.com");
    expect(config.smtp.password).toBe("test-secret");
    expect(config.recipients).toEqual(["x@example.com", "y@example.com"]);
  });

  it("should treat blank variables as missing", async () => {
    const prompt = vi.fn().mockResolvedValueOnce("prompted@example.com");

    const config = await loadConfig({ ...baseEnv, SENDER_EMAIL: "   " }, prompt);

    expect(prompt).toHaveBeenCalledOnce();
    expect(config.senderEmail).toBe("prompted@example.com");
  });

  it("should not prompt for console delivery", async () => {
    const prompt = vi.fn();

    const config = await loadConfig({ REPORT_DELIVERY: "console" }, prompt);

    expect(prompt).not.toHaveBeenCalled();
    expect(config.delivery).toBe("console");
    expect(config.recipients).toEqual([]);
  });

  it("should read the optional settings", async () => {
    const config = await loadConfig(
      {
        ...baseEnv,
        GMP_SOURCE_URL: "https://example.com/gmp",
        SMTP_HOST: "smtp.example.com",
        SMTP_PORT: "2525",
        REPORT_FORMAT: "html",
        REPORT_SUBJECT: "GMP today",
      },
      vi.fn()
    );

    expect(config).toMatchObject({
      sourceUrl: "https://example.com/gmp",
      format: "html",
      subject: "GMP today",
      smtp: { host: "smtp.example.com", port: 2525 },
    });
  });

  it("should reject an unknown report format", async () => {
    await expect(loadConfig({ ...baseEnv, REPORT_FORMAT: "pdf" }, vi.fn())).rejects.toThrow(
      new ConfigError('REPORT_FORMAT must be "text" or "html", got "pdf"')
    );
  });

  it("should reject an unknown delivery mode", async () => {
    await expect(
      loadConfig({ ...baseEnv, REPORT_DELIVERY: "sms" }, vi.fn())
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it("should reject a non-numeric port", async () => {
    await expect(loadConfig({ ...baseEnv, SMTP_PORT: "abc" }, vi.fn())).rejects.toThrow(
      'SMTP_PORT must be a port number, got "abc"'
    );
  });

  it("should reject an invalid source url", async () => {
    await expect(
      loadConfig({ ...baseEnv, GMP_SOURCE_URL: "not a url" }, vi.fn())
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it("should require at least one recipient for email delivery", async () => {
    await expect(loadConfig({ ...baseEnv, RECIPIENT_EMAILS: " , " }, vi.fn())).rejects.toThrow(
      "RECIPIENT_EMAILS must name at least one recipient"
    );
  });
});
