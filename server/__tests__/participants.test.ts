import { describe, it, expect } from "vitest";
import path from "path";
import type { MeetingRecord, Statement } from "@shared/schema";
import { DEFAULT_ALIASES_PATH } from "../config/settings";
import {
  attributeStatements,
  cleanParticipantName,
  collectParticipants,
  createNameNormalizer,
  loadNameNormalizer,
  stripBracketedSegments,
} from "../transcript/participants";
import { ConfigurationError } from "../utils/errorHandler";

describe("cleanParticipantName", () => {
  it("drops role tags and collapses whitespace", () => {
    expect(cleanParticipantName("Kevin[Dev]")).toBe("Kevin");
    expect(cleanParticipantName("Kevin   Jeong")).toBe("Kevin Jeong");
    expect(cleanParticipantName("  Kevin (PM) [Remote] ")).toBe("Kevin");
  });

  it("removes nested groups", () => {
    expect(cleanParticipantName("Kim [team [a]] Lee")).toBe("Kim Lee");
    expect(cleanParticipantName("Park (Ops [on call])")).toBe("Park");
  });

  it("leaves unmatched brackets in place", () => {
    expect(cleanParticipantName("Kim [Dev")).toBe("Kim [Dev");
    expect(stripBracketedSegments("Lee)")).toBe("Lee)");
  });

  it("returns an empty name for a label that is only a tag", () => {
    expect(cleanParticipantName("[Guest]")).toBe("");
  });
});

describe("createNameNormalizer", () => {
  it("normalizes without aliases", () => {
    const normalizer = createNameNormalizer();
    expect(normalizer.normalize("Kevin[Dev]")).toBe("Kevin");
    expect(normalizer.normalize("Kevin   Jeong")).toBe("Kevin Jeong");
  });

  it("resolves aliases after cleaning", () => {
    const normalizer = createNameNormalizer({ Kev: "Kevin Jeong" });

    expect(normalizer.normalize("Kev (guest)")).toBe("Kevin Jeong");
    expect(normalizer.normalize("kev")).toBe("kev");
  });

  it("is idempotent", () => {
    const normalizer = createNameNormalizer({ Kev: "Kevin Jeong", "J. Park": "Jiwoo Park" });
    const inputs = [
      "Kevin[Dev]",
      "  Kev  ",
      "J.  Park (Ops)",
      "Kim [team [a]] Lee",
      "Kim [Dev",
      "(a[b)c]",
      "[Guest]",
      "Lee\t\tSun",
    ];

    for (const input of inputs) {
      const once = normalizer.normalize(input);
      expect(normalizer.normalize(once)).toBe(once);
    }
  });

  it("exposes a frozen alias table", () => {
    const normalizer = createNameNormalizer({ " Kev ": "Kevin Jeong" });
    expect(normalizer.aliases).toEqual({ Kev: "Kevin Jeong" });
    expect(Object.isFrozen(normalizer.aliases)).toBe(true);
  });

  it("rejects an alias that is empty once cleaned", () => {
    expect(() => createNameNormalizer({ "[x]": "Kim" })).toThrow(ConfigurationError);
  });

  it("rejects an alias mapped to two names", () => {
    expect(() => createNameNormalizer({ a: "A", "a ": "B" }, "aliases.json")).toThrow(
      'Invalid configuration in aliases.json: alias "a" maps to both "A" and "B"',
    );
  });

  it("rejects canonical names that are not clean", () => {
    expect(() => createNameNormalizer({ x: " Bad  Name " })).toThrow(ConfigurationError);
  });

  it("rejects alias chains", () => {
    expect(() => createNameNormalizer({ A: "B", B: "C" })).toThrow(
      'canonical name "B" (for "A") is itself an alias of "C"',
    );
  });
});

describe("loadNameNormalizer", () => {
  it("loads the bundled alias file", () => {
    const normalizer = loadNameNormalizer(DEFAULT_ALIASES_PATH);
    expect(normalizer.normalize("Kev")).toBe("Kevin Jeong");
  });

  it("reports a missing file as a configuration error", () => {
    const missing = path.join(path.dirname(DEFAULT_ALIASES_PATH), "does-not-exist.json");
    expect(() => loadNameNormalizer(missing)).toThrow(ConfigurationError);
  });
});

describe("attributeStatements", () => {
  const statement = (speaker: string): Statement => ({ timestamp: null, speaker, text: "ok", wordCount: 1 });

  it("replaces labels with canonical names", () => {
    const normalizer = createNameNormalizer({ Kev: "Kevin Jeong" });
    const result = attributeStatements([statement("Kev [PM]"), statement("Lee")], normalizer);

    expect(result.map(s => s.speaker)).toEqual(["Kevin Jeong", "Lee"]);
  });

  it("sends empty labels to the unknown speaker", () => {
    const result = attributeStatements([statement("[Guest]")], createNameNormalizer());
    expect(result[0].speaker).toBe("Unknown");
  });
});

describe("collectParticipants", () => {
  it("merges declared and speaking participants", () => {
    const records: MeetingRecord[] = [
      { id: "m1", title: "Sync", date: null, participants: ["Lee (PM)"], transcript: "[00:00:01] Kim: hi" },
      { id: "m2", title: "Review", date: null, transcript: "[00:00:01] Kev: hello\n[00:00:02] Kim: yes" },
    ];
    const normalizer = createNameNormalizer({ Kev: "Kevin Jeong" });

    expect(collectParticipants(records, normalizer)).toEqual(["Kevin Jeong", "Kim", "Lee"]);
  });
});
