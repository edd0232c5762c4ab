import { describe, it, expect, beforeEach } from "vitest";
import { MemStorage } from "../memStorage";

describe("MemStorage", () => {
  let storage: MemStorage;

  beforeEach(() => {
    storage = new MemStorage();
  });

  describe("users", () => {
    it("should find a created user by id and username", async () => {
      const user = await storage.createUser({ username: "clerk", passwordHash: "hash" });

      expect(await storage.getUserById(user.id)).toEqual(user);
      expect(await storage.getUserByUsername("clerk")).toEqual(user);
      expect(await storage.getUserByUsername("mayor")).toBeUndefined();
      expect(user.lastLoginAt).toBeNull();
    });

    it("should record the last login", async () => {
      const user = await storage.createUser({ username: "clerk", passwordHash: "hash" });

      await storage.updateUserLastLogin(user.id);

      expect((await storage.getUserById(user.id))?.lastLoginAt).toBeInstanceOf(Date);
    });
  });

  describe("chat interactions", () => {
    it("should list a user's interactions newest first", async () => {
      await storage.createChatInteraction({ userId: "u1", question: "first", response: "a" });
      await storage.createChatInteraction({ userId: "u2", question: "other", response: "b" });
      await storage.createChatInteraction({ userId: "u1", question: "second", response: "c" });

      const history = await storage.getChatInteractionsByUser("u1");

      expect(history.map((entry) => entry.question)).toEqual(["second", "first"]);
      expect(await storage.countChatInteractions()).toBe(3);
    });
  });

  describe("concerns", () => {
    it("should default new concerns to Open", async () => {
      const concern = await storage.createConcern({ text: "Pothole on Main St" });

      expect(concern.status).toBe("Open");
    });

    it("should return nothing for a non-positive limit", async () => {
      await storage.createConcern({ text: "a" });

      expect(await storage.getRecentConcerns(0)).toEqual([]);
    });

    it("should update the status of a known concern", async () => {
      const concern = await storage.createConcern({ text: "Noise complaint" });

      const updated = await storage.updateConcernStatus(concern.id, "Resolved");

      expect(updated?.status).toBe("Resolved");
      expect((await storage.getRecentConcerns(10))[0].status).toBe("Resolved");
    });

    it("should return undefined for an unknown concern", async () => {
      expect(await storage.updateConcernStatus("missing", "Resolved")).toBeUndefined();
    });
  });
});
