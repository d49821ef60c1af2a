import { describe, it, expect } from "vitest";
import { KNOWN_VERBS, parseCommand } from "./parser.js";

describe("parseCommand", () => {
  describe("known verbs", () => {
    it.each([...KNOWN_VERBS])("should parse @rolevote %s without a slash", (verb) => {
      expect(parseCommand(`@rolevote ${verb}`)).toEqual({ verb, freeText: undefined });
    });

    it("should accept a leading slash", () => {
      expect(parseCommand("@rolevote /deny")).toEqual({ verb: "deny", freeText: undefined });
    });

    it("should be case-insensitive and lowercase the verb", () => {
      expect(parseCommand("@RoleVote Approve")).toEqual({ verb: "approve", freeText: undefined });
    });
  });

  describe("unknown verbs", () => {
    it("should ignore prose addressed to the bot", () => {
      expect(parseCommand("@rolevote thanks!")).toBeNull();
    });

    it("should forward an unknown verb written with a slash", () => {
      expect(parseCommand("@rolevote /promote")).toEqual({ verb: "promote", freeText: undefined });
    });
  });

  describe("free text", () => {
    it("should capture the rest of the line trimmed", () => {
      expect(parseCommand("@rolevote feedback   needs more docs  ")).toEqual({
        verb: "feedback",
        freeText: "needs more docs",
      });
    });

    it("should stop at the end of the line", () => {
      expect(parseCommand("Thanks all.\n@rolevote override deny\nSee the discussion above.")).toEqual({
        verb: "override",
        freeText: "deny",
      });
    });

    it("should keep every line of feedback", () => {
      expect(parseCommand("@rolevote feedback great reviewer\nbut needs more docs work")).toEqual({
        verb: "feedback",
        freeText: "great reviewer\nbut needs more docs work",
      });
    });

    it("should take feedback that starts on the next line", () => {
      expect(parseCommand("@rolevote feedback\n\nSolid triage work.\n")).toEqual({
        verb: "feedback",
        freeText: "Solid triage work.",
      });
    });

    it("should leave quotes and code blocks out of feedback", () => {
      expect(
        parseCommand("@rolevote feedback helpful\n> @bob said otherwise\n```\nlog output\n```\nthanks"),
      ).toEqual({ verb: "feedback", freeText: "helpful\n\nthanks" });
    });

    it("should not treat punctuation glued to the verb as text", () => {
      expect(parseCommand("@rolevote approve!")).toEqual({ verb: "approve", freeText: undefined });
    });
  });

  describe("placement", () => {
    it("should require the mention to start a line", () => {
      expect(parseCommand("I think @rolevote approve is right")).toBeNull();
    });

    it("should allow leading whitespace", () => {
      expect(parseCommand("   @rolevote abstain")).toEqual({ verb: "abstain", freeText: undefined });
    });

    it("should not match a longer handle", () => {
      expect(parseCommand("@rolevotebot approve")).toBeNull();
    });

    it("should return null for a bare mention", () => {
      expect(parseCommand("@rolevote")).toBeNull();
    });
  });

  describe("ignored content", () => {
    it("should skip fenced code blocks", () => {
      expect(parseCommand("```\n@rolevote approve\n```")).toBeNull();
    });

    it("should skip inline code mentioning the bot", () => {
      expect(parseCommand("`@rolevote approve` is how you vote")).toBeNull();
    });

    it("should skip quoted lines and use the next command", () => {
      expect(parseCommand("> @rolevote approve\n\n@rolevote deny")).toEqual({ verb: "deny", freeText: undefined });
    });
  });
});
