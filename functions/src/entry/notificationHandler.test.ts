import { describe, expect, it } from "vitest";

import { FakePushSender, FakeResponse, InMemoryChatStore, RecordingLogger, testConfig } from "../testing/fakes";
import { createHealthHandler } from "./healthHandler";
import { createTestNotificationHandler } from "./notificationHandler";

function setup(push = new FakePushSender()) {
  const store = new InMemoryChatStore()
    .addUser({ id: "u1", displayName: "Sam", fcmToken: "token-u1" })
    .addUser({ id: "u2", displayName: "Kim" });
  const handler = createTestNotificationHandler({ config: testConfig(), logger: new RecordingLogger(), store, push });
  return { handler, push };
}

async function post(handler: ReturnType<typeof setup>["handler"], body: unknown) {
  const res = new FakeResponse();
  await handler({ method: "POST", body }, res);
  return res;
}

describe("testNotification", () => {
  it("requires a userId", async () => {
    const res = await post(setup().handler, { title: "Hi" });

    expect(res.statusCode).toBe(400);
    expect(res.body).toBe("Missing userId");
  });

  it("answers 404 for unknown users and users without a token", async () => {
    const { handler, push } = setup();

    const unknown = await post(handler, { userId: "ghost" });
    expect(unknown.statusCode).toBe(404);
    expect(unknown.body).toBe("User not found");

    const noToken = await post(handler, { userId: "u2" });
    expect(noToken.statusCode).toBe(404);
    expect(noToken.body).toBe("No FCM token for user");

    expect(push.sent).toEqual([]);
  });

  it("sends the default title and body", async () => {
    const { handler, push } = setup();

    const res = await post(handler, { userId: "u1" });

    expect(res.statusCode).toBe(200);
    expect(res.body).toBe("Notification sent: projects/test/messages/1");
    expect(push.sent).toEqual([
      { token: "token-u1", notification: { title: "Test", body: "Test notification" } },
    ]);
  });

  it("reports provider errors as text", async () => {
    const { handler } = setup(new FakePushSender(new Error("invalid registration token")));

    const res = await post(handler, { userId: "u1", title: "Hi", body: "There" });

    expect(res.statusCode).toBe(500);
    expect(res.body).toBe("Error: invalid registration token");
  });
});

describe("healthCheck", () => {
  it("answers OK", async () => {
    const res = new FakeResponse();
    await createHealthHandler()({ method: "GET" }, res);

    expect(res.statusCode).toBe(200);
    expect(res.body).toBe("OK");
  });
});
