import { describe, it, expect, vi } from "vitest";
import { EmailChannel, type EmailSender } from "../../../src/notifications/email/client";
import { makeAlert } from "../../fixtures/alerts";

function fakeSender(response: Awaited<ReturnType<EmailSender["send"]>>) {
  const send = vi.fn().mockResolvedValue(response);
  const sender: EmailSender = { send };
  return { sender, send };
}

describe("EmailChannel", () => {
  it("should require a recipient", () => {
    const { sender } = fakeSender({ data: null, error: null });
    expect(() => new EmailChannel({ from: "risk@example.com", to: [], sender })).toThrow(
      "Email channel needs at least one recipient"
    );
  });

  it("should require an API key or a sender", () => {
    expect(() => new EmailChannel({ from: "risk@example.com", to: ["ops@example.com"] })).toThrow(
      "Email channel needs an API key or a sender"
    );
  });

  it("should send the subject and both bodies", async () => {
    const { sender, send } = fakeSender({ data: { id: "email-1" }, error: null });
    const channel = new EmailChannel({ from: "risk@example.com", to: ["ops@example.com"], sender });

    const result = await channel.deliver(makeAlert());

    expect(result).toMatchObject({ success: true, channel: "email", providerId: "email-1" });
    const [payload] = send.mock.calls[0] ?? [];
    expect(payload.from).toBe("risk@example.com");
    expect(payload.to).toEqual(["ops@example.com"]);
    expect(payload.subject).toBe("Risk Alert: HIGH_CLIENT_EXPOSURE - CRITICAL");
    expect(payload.text.startsWith("RISK ALERT - CRITICAL\n")).toBe(true);
    expect(payload.html.startsWith('<h2 style="color:#ff0000">')).toBe(true);
  });

  it("should not retry validation errors", async () => {
    const { sender } = fakeSender({ data: null, error: { message: "Invalid `to` field", name: "validation_error" } });
    const result = await new EmailChannel({ from: "risk@example.com", to: ["ops@example.com"], sender }).deliver(
      makeAlert()
    );

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("[email] Invalid `to` field");
      expect(result.error.retryable).toBe(false);
    }
  });

  it("should retry provider errors", async () => {
    const { sender } = fakeSender({ data: null, error: { message: "Internal error", name: "application_error" } });
    const result = await new EmailChannel({ from: "risk@example.com", to: ["ops@example.com"], sender }).deliver(
      makeAlert()
    );

    expect(!result.success && result.error.retryable).toBe(true);
  });

  it("should report thrown errors as retryable", async () => {
    const send = vi.fn().mockRejectedValue(new Error("socket hang up"));
    const channel = new EmailChannel({ from: "risk@example.com", to: ["ops@example.com"], sender: { send } });

    const result = await channel.deliver(makeAlert());

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("[email] Failed to send email: socket hang up");
      expect(result.error.retryable).toBe(true);
    }
  });
});
