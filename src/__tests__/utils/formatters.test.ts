import { describe, expect, test } from "vitest";
import { clipLines, sessionHeader, truncate } from "../../utils/formatters";

describe("formatters", () => {
  describe("truncate", () => {
    test("should keep text that fits", () => {
      expect(truncate("api-0", 5)).toBe("api-0");
    });

    test("should cut long text and end with an ellipsis", () => {
      expect(truncate("kubernetes", 5)).toBe("kube…");
    });

    test("should measure wide characters by display width", () => {
      expect(truncate("日本語", 4)).toBe("日…");
    });

    test("should return nothing for a non-positive width", () => {
      expect(truncate("api-0", 0)).toBe("");
    });
  });

  describe("clipLines", () => {
    test("should keep short text and drop trailing whitespace", () => {
      expect(clipLines("a\nb\n\n", 3)).toBe("a\nb");
    });

    test("should note how many lines were hidden", () => {
      expect(clipLines("a\nb\nc\nd\n", 3)).toBe("a\nb\n… (2 more lines)");
    });
  });

  describe("sessionHeader", () => {
    test("should show context and namespace", () => {
      expect(sessionHeader("kind-dev", "team-a")).toBe(
        " Context: kind-dev | Namespace: team-a ",
      );
    });

    test("should show None without a context", () => {
      expect(sessionHeader(null, "default")).toBe(" Context: None | Namespace: default ");
    });
  });
});
