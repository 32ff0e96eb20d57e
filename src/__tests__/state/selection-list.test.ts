import { describe, expect, test } from "vitest";
import {
  createSelectionList,
  cursorIndex,
  moveDown,
  moveUp,
  replaceItems,
  selectedItem,
} from "../../state/selection-list";

describe("SelectionList", () => {
  describe("createSelectionList", () => {
    test("should put the cursor on the first item of a non-empty list", () => {
      expect(createSelectionList(["a", "b"]).cursor).toBe(0);
    });

    test("should have no cursor when empty", () => {
      expect(createSelectionList([]).cursor).toBeNull();
    });

    test("should copy the given items", () => {
      const items = ["a"];
      const list = createSelectionList(items);
      items.push("b");
      expect(list.items).toEqual(["a"]);
    });
  });

  describe("moveUp", () => {
    test("should saturate at the first item", () => {
      let list = createSelectionList(["a", "b", "c"]);
      list = moveUp(list);
      list = moveUp(list);
      expect(list.cursor).toBe(0);
    });

    test("should move one step towards the start", () => {
      const list = { items: ["a", "b", "c"], cursor: 2 };
      expect(moveUp(list).cursor).toBe(1);
    });

    test("should leave an empty list untouched", () => {
      const list = createSelectionList<string>([]);
      expect(moveUp(list)).toBe(list);
    });
  });

  describe("moveDown", () => {
    test("should wrap from the last item to the first", () => {
      const list = { items: ["a", "b", "c"], cursor: 2 };
      expect(moveDown(list).cursor).toBe(0);
    });

    test("should move one step towards the end", () => {
      expect(moveDown(createSelectionList(["a", "b"])).cursor).toBe(1);
    });

    test("should wrap on a single-item list", () => {
      expect(moveDown(createSelectionList(["only"])).cursor).toBe(0);
    });

    test("should leave an empty list untouched", () => {
      const list = createSelectionList<string>([]);
      expect(moveDown(list)).toBe(list);
    });
  });

  describe("selectedItem", () => {
    test("should return the item under the cursor", () => {
      const list = { items: ["default", "kube-system"], cursor: 1 };
      expect(selectedItem(list)).toBe("kube-system");
    });

    test("should return undefined for an empty list", () => {
      expect(selectedItem(createSelectionList([]))).toBeUndefined();
    });
  });

  describe("replaceItems", () => {
    test("should reset the cursor to 0 regardless of the previous cursor", () => {
      const list = { items: ["a", "b", "c"], cursor: 2 };
      const replaced = replaceItems(list, ["x", "y"]);
      expect(replaced).toEqual({ items: ["x", "y"], cursor: 0 });
    });

    test("should clear the cursor when the new items are empty", () => {
      const list = { items: ["a", "b"], cursor: 1 };
      expect(replaceItems(list, []).cursor).toBeNull();
    });
  });

  describe("cursorIndex", () => {
    test("should fall back to 0 when there is no cursor", () => {
      expect(cursorIndex(createSelectionList([]))).toBe(0);
    });
  });
});
