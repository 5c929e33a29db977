import { createHash } from "node:crypto";
import { describe, expect, it } from "vitest";
import { createEmailRecord, emailId, emailText } from "./email.js";

describe("createEmailRecord", () => {
  it("freezes the record and normalises dates to ISO text", () => {
    const email = createEmailRecord({
      subject: "Invoice question",
      body: "Why was VAT added?",
      receivedAt: new Date("2024-03-01T09:30:00Z"),
      metadata: { mailbox: "sales" },
    });

    expect(email.receivedAt).toBe("2024-03-01T09:30:00.000Z");
    expect(Object.isFrozen(email)).toBe(true);
    expect(Object.isFrozen(email.metadata)).toBe(true);
    expect("sender" in email).toBe(false);
  });

  it("keeps string timestamps as given", () => {
    const email = createEmailRecord({
      subject: "s",
      body: "b",
      receivedAt: "2024-03-01",
    });
    expect(email.receivedAt).toBe("2024-03-01");
  });
});

describe("emailText", () => {
  it("joins subject and body with a space", () => {
    expect(emailText(createEmailRecord({ subject: "Hello", body: "World" }))).toBe(
      "Hello World"
    );
  });
});

describe("emailId", () => {
  it("is the md5 of subject, body, sender and timestamp", () => {
    const email = createEmailRecord({
      subject: "Sample",
      body: "Please send 1 kg",
      sender: "lab@example.com",
      receivedAt: "2024-05-05T00:00:00Z",
    });
    const expected = createHash("md5")
      .update("SamplePlease send 1 kglab@example.com2024-05-05T00:00:00Z")
      .digest("hex");

    expect(emailId(email)).toBe(expected);
  });

  it("differs when the sender differs", () => {
    const a = createEmailRecord({ subject: "s", body: "b", sender: "a@example.com" });
    const b = createEmailRecord({ subject: "s", body: "b", sender: "b@example.com" });
    expect(emailId(a)).not.toBe(emailId(b));
  });
});
