import { describe, it, expect } from "vitest";
import { createChannelsFromConfig } from "../../src/notifications";

const base = { emailTo: [], maxRetries: 3, retryDelayMs: 1000, timeoutMs: 5000 };

describe("createChannelsFromConfig", () => {
  it("should return no channels when nothing is configured", () => {
    expect(createChannelsFromConfig(base)).toEqual([]);
  });

  it("should enable the webhook channel", () => {
    const channels = createChannelsFromConfig({ ...base, slackWebhookUrl: "https://hooks.example.com/T000" });
    expect(channels.map((c) => c.name)).toEqual(["webhook"]);
  });

  it("should enable email only with key, sender and recipients", () => {
    expect(createChannelsFromConfig({ ...base, resendApiKey: "test-secret", emailTo: ["ops@example.com"] })).toEqual([]);

    const channels = createChannelsFromConfig({
      ...base,
      slackWebhookUrl: "https://hooks.example.com/T000",
      resendApiKey: "test-secret",
      emailFrom: "risk@example.com",
      emailTo: ["ops@example.com"],
    });
    expect(channels.map((c) => c.name)).toEqual(["webhook", "email"]);
  });
});
