import { describe, it, expect } from "vitest";
import { helpFields } from "../../src/discord/help.js";

describe("helpFields", () => {
  it("shows members only the member section and a note", () => {
    expect(helpFields({ hr: false, staff: false }).map((f) => f.name)).toEqual([
      "📝 Member Commands",
      "ℹ️ Note",
    ]);
  });

  it("shows staff moderation and announcement sections", () => {
    expect(helpFields({ hr: false, staff: true }).map((f) => f.name)).toEqual([
      "📝 Member Commands",
      "🛡️ Moderation Commands",
      "📢 Announcement Commands",
    ]);
  });

  it("shows HR every section", () => {
    const fields = helpFields({ hr: true, staff: true });
    expect(fields.map((f) => f.name)).toEqual([
      "📝 Member Commands",
      "👔 HR Commands",
      "🛡️ Moderation Commands",
      "📢 Announcement Commands",
    ]);
    expect(fields[1].value.startsWith("**`/contributions list [member] [limit]`**\nView all contributions")).toBe(true);
  });

  it("keeps every section within the embed field limit", () => {
    for (const field of helpFields({ hr: true, staff: true })) {
      expect(field.value.length).toBeLessThanOrEqual(1024);
    }
  });
});
