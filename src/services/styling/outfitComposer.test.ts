import { describe, expect, it } from "vitest";
import { scoreCandidates } from "./categoryMatcher.js";
import { composeOutfit, groupBySlot } from "./outfitComposer.js";
import { seededRandom } from "./random.js";
import { tagsFor } from "./tagLexicon.js";
import { interviewWardrobe, makeItem } from "../../test/fixtures.js";

const coat = makeItem("coat-1", "outerwear", ["All-Season", "Outerwear"]);
const scarf = makeItem("scarf-1", "accessory", ["Winter"]);

describe("groupBySlot", () => {
  it("drops accessories", () => {
    const groups = groupBySlot([...interviewWardrobe(), coat, scarf]);

    expect(groups.top.map((item) => item.id)).toEqual(["top-1"]);
    expect(groups.outerwear).toEqual([coat]);
    expect(Object.values(groups).flat()).not.toContain(scarf);
  });
});

describe("composeOutfit", () => {
  it("fills every slot for an interview, even without a tag match", () => {
    const wardrobe = interviewWardrobe();
    const outfit = composeOutfit("Job interview today", wardrobe, seededRandom(1));

    expect(outfit.top?.id).toBe("top-1");
    expect(outfit.bottom?.id).toBe("bottom-1");
    expect(outfit.shoes?.id).toBe("shoes-1");
    expect(outfit.outerwear).toBeNull();
    expect(outfit.matchedKeywords).toEqual(["interview"]);
    expect(outfit.items.map((item) => item.id)).toEqual(["top-1", "bottom-1", "shoes-1"]);
    expect(outfit.isValid).toBe(true);

    // shoes were chosen without any overlap
    const { tags } = tagsFor("Job interview today");
    expect(scoreCandidates([wardrobe[2]], tags).maxScore).toBe(0);
  });

  it("adds outerwear only when the weather calls for it", () => {
    const wardrobe = [...interviewWardrobe(), coat];

    expect(composeOutfit("Rainy day walk", wardrobe, seededRandom(3)).outerwear).toBe(coat);
    expect(composeOutfit("Casual coffee date", wardrobe, seededRandom(3)).outerwear).toBeNull();
  });

  it("never includes accessories", () => {
    const outfit = composeOutfit("Winter party", [scarf], seededRandom(1));

    expect(outfit.items).toEqual([]);
    expect(outfit.isValid).toBe(false);
  });

  it("treats outerwear alone as invalid", () => {
    const outfit = composeOutfit("Cold morning", [coat], seededRandom(1));

    expect(outfit.outerwear).toBe(coat);
    expect(outfit.items).toEqual([coat]);
    expect(outfit.isValid).toBe(false);
  });

  it("is valid as soon as any core slot is filled", () => {
    const outfit = composeOutfit("Errands", [makeItem("shoes-9", "shoes")], seededRandom(1));

    expect(outfit.isValid).toBe(true);
    expect(outfit.top).toBeNull();
  });

  it("returns the same outfit for the same seed", () => {
    const wardrobe = [
      ...interviewWardrobe(),
      makeItem("top-2", "top", ["Formal", "Business"]),
      makeItem("bottom-2", "bottom", ["Formal"]),
      coat,
    ];

    expect(composeOutfit("Cold office day", wardrobe, seededRandom(7))).toEqual(
      composeOutfit("Cold office day", wardrobe, seededRandom(7))
    );
  });

  it("returns a frozen outfit", () => {
    const outfit = composeOutfit("Gym", interviewWardrobe(), seededRandom(1));

    expect(Object.isFrozen(outfit)).toBe(true);
    expect(Object.isFrozen(outfit.items)).toBe(true);
  });
});
