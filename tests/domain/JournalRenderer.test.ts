import { describe, it, expect } from "vitest";
import {
  JournalRenderer,
  classifyChange,
} from "../../src/domain/services/JournalRenderer";
import type { FieldChange } from "../../src/domain/models/Issue";
import type { LookupTables } from "../../src/domain/models/MappingModels";
import { UnresolvedCodeError } from "../../src/domain/models/Errors";
import { emptyTables, makeEvent } from "../fakes";

const tables: LookupTables = {
  statuses: { "1": "New", "5": "Closed" },
  trackers: { "1": "Bug", "2": "Feature" },
  projects: { "7": "Website", "8": "Intranet" },
  users: { "42": "Piet Jansen" },
};

function attr(
  property: string,
  oldValue: string | null,
  newValue: string | null
): FieldChange {
  return { scope: "attr", property, oldValue, newValue };
}

describe("classifyChange", () => {
  it("recognises coded and special attributes", () => {
    expect(classifyChange(attr("status_id", "1", "5"))).toEqual({
      kind: "status",
    });
    expect(classifyChange(attr("done_ratio", "0", "10"))).toEqual({
      kind: "doneRatio",
    });
    expect(classifyChange(attr("description", "a", "b"))).toEqual({
      kind: "longText",
      field: "description",
    });
  });

  it("recognises relations only in relation scope", () => {
    expect(
      classifyChange({
        scope: "relation",
        property: "duplicates",
        oldValue: null,
        newValue: "3",
      })
    ).toEqual({ kind: "relation", relation: "duplicates" });
    expect(classifyChange(attr("blocks", null, "3"))).toEqual({
      kind: "generic",
    });
  });

  it("falls back to generic", () => {
    expect(classifyChange(attr("due_date", null, "2024-02-01"))).toEqual({
      kind: "generic",
    });
    expect(
      classifyChange({ scope: "cf", property: "4", oldValue: "a", newValue: "b" })
    ).toEqual({ kind: "generic" });
  });
});

describe("JournalRenderer.renderChange", () => {
  const renderer = new JournalRenderer();

  it("adds a percent sign to done ratio values", () => {
    expect(renderer.renderChange(attr("done_ratio", "20", "50"), tables)).toBe(
      "*% Done changed from 20% to 50%*"
    );
  });

  it("resolves status, tracker and project codes", () => {
    expect(renderer.renderChange(attr("status_id", "1", "5"), tables)).toBe(
      "*Status changed from New to Closed*"
    );
    expect(renderer.renderChange(attr("tracker_id", "1", "2"), tables)).toBe(
      "*Tracker changed from Bug to Feature*"
    );
    expect(renderer.renderChange(attr("project_id", "7", "8"), tables)).toBe(
      "*Project changed from Website to Intranet*"
    );
  });

  it.each([
    ["status_id", "statuses"],
    ["tracker_id", "trackers"],
    ["project_id", "projects"],
  ])("refuses an unknown %s code", (property, table) => {
    expect(() =>
      renderer.renderChange(attr(property, "1", "99"), emptyTables)
    ).toThrow(new UnresolvedCodeError(table, "1", property));
  });

  it("refuses a new status missing from the table", () => {
    expect(() =>
      renderer.renderChange(attr("status_id", "1", "99"), tables)
    ).toThrow('Cannot render status_id: no entry "99" in statuses');
  });

  it("resolves assignees and keeps unknown user IDs as they are", () => {
    expect(
      renderer.renderChange(attr("assigned_to_id", null, "42"), tables)
    ).toBe("*Assignee changed from None to Piet Jansen*");
    expect(
      renderer.renderChange(attr("assigned_to_id", "42", "99"), tables)
    ).toBe("*Assignee changed from Piet Jansen to 99*");
  });

  it("marks relation values as issue references", () => {
    const change: FieldChange = {
      scope: "relation",
      property: "blocks",
      oldValue: null,
      newValue: "482",
    };
    expect(renderer.renderChange(change, tables)).toBe(
      "*Blocks changed from None to #482*"
    );
  });

  it("shows an empty old value as None", () => {
    expect(
      renderer.renderChange(attr("due_date", "", "2024-02-01"), emptyTables)
    ).toBe("*Due date changed from None to 2024-02-01*");
  });

  it("quotes long text changes line by line", () => {
    expect(
      renderer.renderChange(
        attr("description", "first line\r\nsecond line", "rewritten"),
        emptyTables
      )
    ).toBe(
      "*Description changed from:*\n> first line\n> second line\n\n*to:*\n> rewritten"
    );
  });

  it("labels custom fields and unknown attributes", () => {
    expect(
      renderer.renderChange(
        { scope: "cf", property: "4", oldValue: "a", newValue: "b" },
        emptyTables
      )
    ).toBe("*Custom field 4 changed from a to b*");
    expect(renderer.renderChange(attr("foo_bar", "a", "b"), emptyTables)).toBe(
      "*foo_bar changed from a to b*"
    );
  });
});

describe("JournalRenderer.render", () => {
  const renderer = new JournalRenderer();
  const ctx = { tables, timeZone: "Europe/Amsterdam" };

  it("separates the note from the changes and ends with the local time", () => {
    const event = makeEvent({
      notes: "Looks fixed.\r\n",
      changes: [attr("status_id", "1", "5"), attr("done_ratio", "20", "100")],
    });
    expect(renderer.render(event, ctx)).toBe(
      [
        "Looks fixed.",
        "---",
        "*Status changed from New to Closed*\n*% Done changed from 20% to 100%*",
        "*2024-01-15 11:30 (Europe/Amsterdam)*",
      ].join("\n\n")
    );
  });

  it("omits the separator when only a note is present", () => {
    const event = makeEvent({ notes: "Just a comment" });
    expect(renderer.render(event, ctx)).toBe(
      "Just a comment\n\n*2024-01-15 11:30 (Europe/Amsterdam)*"
    );
  });

  it("renders an empty journal as the timestamp line", () => {
    expect(renderer.render(makeEvent(), ctx)).toBe(
      "*2024-01-15 11:30 (Europe/Amsterdam)*"
    );
  });

  it("applies daylight saving time of the configured zone", () => {
    const event = makeEvent({ createdOn: new Date("2024-07-01T08:00:00Z") });
    expect(renderer.render(event, ctx)).toBe(
      "*2024-07-01 10:00 (Europe/Amsterdam)*"
    );
    expect(renderer.render(event, { tables, timeZone: "UTC" })).toBe(
      "*2024-07-01 08:00 (UTC)*"
    );
  });

  it("credits the original author when posted under another account", () => {
    const event = makeEvent({ notes: "Done" });
    expect(
      renderer.render(event, { ...ctx, attributeTo: "Piet Jansen" })
    ).toBe(
      "Done\n\n*2024-01-15 11:30 (Europe/Amsterdam)*\n\n*Originally posted by Piet Jansen*"
    );
  });

  it("is deterministic", () => {
    const event = makeEvent({
      notes: "x",
      changes: [attr("assigned_to_id", "42", null)],
    });
    expect(renderer.render(event, ctx)).toBe(renderer.render(event, ctx));
  });
});
