import { describe, it, expect, vi, afterEach } from "vitest";
import {
  ReferenceRewriter,
  captureReferences,
  scanReferences,
} from "../../src/domain/services/ReferenceRewriter";
import { IdentifierRegistry } from "../../src/domain/services/IdentifierRegistry";
import { RegistryOpenError } from "../../src/domain/models/Errors";
import type { DeferredReference } from "../../src/domain/models/PendingRelation";
import { FakeGitea, MemoryRegistryStore } from "../fakes";

function closedRegistry(entries: Array<[number, number]>): IdentifierRegistry {
  const registry = new IdentifierRegistry(new MemoryRegistryStore());
  for (const [s, t] of entries) registry.record(s, t);
  registry.close();
  return registry;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("scanReferences", () => {
  it("finds distinct issue tokens in order of appearance", () => {
    expect(scanReferences("See #12, #7 and again #12.")).toEqual([
      { token: "#12", sourceId: 12 },
      { token: "#7", sourceId: 7 },
    ]);
  });

  it("ignores headings, entities, anchors and words", () => {
    expect(
      scanReferences(
        "## Description\nIt&#39;s on page#3, see /#/5 or #5a or ##6."
      )
    ).toEqual([]);
  });

  it("accepts tokens at line starts and inside parentheses", () => {
    expect(scanReferences("#1 first\n(blocked by #2)")).toEqual([
      { token: "#1", sourceId: 1 },
      { token: "#2", sourceId: 2 },
    ]);
  });
});

describe("captureReferences", () => {
  const location = { repository: "acme/site", issueNumber: 3 };

  it("returns nothing for text without tokens", () => {
    expect(captureReferences(location, "plain text")).toBeUndefined();
  });

  it("records the location, text and tokens", () => {
    expect(
      captureReferences({ ...location, commentId: 9 }, "dup of #482")
    ).toEqual({
      repository: "acme/site",
      issueNumber: 3,
      commentId: 9,
      text: "dup of #482",
      tokens: [{ token: "#482", sourceId: 482 }],
    });
  });
});

describe("ReferenceRewriter", () => {
  const bodyRef: DeferredReference = {
    repository: "acme/site",
    issueNumber: 1,
    text: "Caused by #482, see also #482 and #9",
    tokens: [
      { token: "#482", sourceId: 482 },
      { token: "#9", sourceId: 9 },
    ],
  };

  it("refuses to run while the registry is open", async () => {
    const registry = new IdentifierRegistry(new MemoryRegistryStore());
    const rewriter = new ReferenceRewriter(new FakeGitea());
    await expect(rewriter.rewriteAll([bodyRef], registry)).rejects.toThrow(
      RegistryOpenError
    );
  });

  it("rewrites every resolved token and keeps both IDs visible", async () => {
    const gitea = new FakeGitea();
    const report = await new ReferenceRewriter(gitea).rewriteAll(
      [bodyRef],
      closedRegistry([
        [482, 17],
        [9, 4],
      ])
    );

    expect(gitea.bodyEdits).toEqual([
      {
        issueNumber: 1,
        body: "Caused by #17 (original-id: 482), see also #17 (original-id: 482) and #4 (original-id: 9)",
      },
    ]);
    expect(report).toEqual({ updated: 1, unresolved: [] });
  });

  it("does not rewrite a substituted ID that is itself a source ID", async () => {
    const gitea = new FakeGitea();
    const ref: DeferredReference = {
      repository: "acme/site",
      issueNumber: 1,
      text: "#1 and #2",
      tokens: [
        { token: "#1", sourceId: 1 },
        { token: "#2", sourceId: 2 },
      ],
    };
    await new ReferenceRewriter(gitea).rewriteAll(
      [ref],
      closedRegistry([
        [1, 2],
        [2, 3],
      ])
    );
    expect(gitea.bodyEdits[0].body).toBe(
      "#2 (original-id: 1) and #3 (original-id: 2)"
    );
  });

  it("edits comments and leaves unresolved tokens untouched", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
    const gitea = new FakeGitea();
    const commentRef: DeferredReference = {
      repository: "acme/site",
      issueNumber: 2,
      commentId: 101,
      text: "Related to #482 and private #900",
      tokens: [
        { token: "#482", sourceId: 482 },
        { token: "#900", sourceId: 900 },
      ],
    };

    const report = await new ReferenceRewriter(gitea).rewriteAll(
      [commentRef],
      closedRegistry([[482, 17]])
    );

    expect(gitea.commentEdits).toEqual([
      {
        commentId: 101,
        body: "Related to #17 (original-id: 482) and private #900",
      },
    ]);
    expect(gitea.bodyEdits).toEqual([]);
    expect(report.unresolved).toEqual([
      {
        location: { repository: "acme/site", issueNumber: 2, commentId: 101 },
        token: "#900",
        sourceId: 900,
      },
    ]);
    expect(console.warn).toHaveBeenCalledWith(
      "⚠️ Unresolved reference #900 in acme/site#2 comment 101"
    );
  });

  it("skips the edit when nothing resolved", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const gitea = new FakeGitea();
    const report = await new ReferenceRewriter(gitea).rewriteAll(
      [bodyRef],
      closedRegistry([])
    );
    expect(gitea.bodyEdits).toEqual([]);
    expect(report.updated).toBe(0);
    expect(report.unresolved.map((u) => u.token)).toEqual(["#482", "#9"]);
  });

  it("reports each reference as consumed after handling it", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const gitea = new FakeGitea();
    const unresolvable: DeferredReference = {
      repository: "acme/site",
      issueNumber: 2,
      text: "see #900",
      tokens: [{ token: "#900", sourceId: 900 }],
    };
    const consumed: number[] = [];

    await new ReferenceRewriter(gitea).rewriteAll(
      [bodyRef, unresolvable],
      closedRegistry([[482, 17]]),
      async (ref) => {
        consumed.push(ref.issueNumber);
        expect(gitea.bodyEdits).toHaveLength(1);
      }
    );

    expect(consumed).toEqual([1, 2]);
  });
});
