import { describe, it, expect } from "vitest";
import {
  cleanMarkdownFromJson,
  createBarcodeIdentification,
  createFallbackIdentification,
  parseIdentification,
  parsePartialIdentification,
  toProductCategory,
} from "@/lib/openai/identificationParser";

describe("cleanMarkdownFromJson", () => {
  it("strips fenced json blocks", () => {
    const content = '```json\n{"brand": "Nike"}\n```';
    expect(cleanMarkdownFromJson(content)).toBe('{"brand": "Nike"}');
  });

  it("strips upper-case fences and surrounding prose", () => {
    const content = 'Here you go:\n```JSON\n{"brand": "Apple"}\n```\nHope that helps!';
    expect(cleanMarkdownFromJson(content)).toBe('{"brand": "Apple"}');
  });

  it("keeps nested objects intact", () => {
    expect(cleanMarkdownFromJson('x {"a": {"b": 1}} y')).toBe('{"a": {"b": 1}}');
  });

  it("returns trimmed text when there is no object", () => {
    expect(cleanMarkdownFromJson("  no json here \n")).toBe("no json here");
  });
});

describe("toProductCategory", () => {
  it("maps model categories case-insensitively", () => {
    expect(toProductCategory("sneakers")).toBe("Sneakers");
    expect(toProductCategory("ELECTRONICS")).toBe("Electronics");
    expect(toProductCategory(" home ")).toBe("Home");
  });

  it("falls back to Other", () => {
    expect(toProductCategory("furniture")).toBe("Other");
    expect(toProductCategory(42)).toBe("Other");
  });
});

describe("parseIdentification", () => {
  it("parses a complete response", () => {
    const content = JSON.stringify({
      exactModelName: "Air Force 1 Low '07",
      brand: "Nike",
      productLine: "Air Force 1",
      styleVariant: "Low",
      styleCode: "CW2288-111",
      colorway: "White/White",
      size: "10",
      category: "sneakers",
      subcategory: "Basketball shoes",
      confidence: 0.95,
      identificationDetails: ["Swoosh on side panel", "Tongue label"],
      alternativePossibilities: ["Air Force 1 Mid"],
    });

    const result = parseIdentification(content);

    expect(result).toEqual({
      exact_model_name: "Air Force 1 Low '07",
      brand: "Nike",
      product_line: "Air Force 1",
      style_variant: "Low",
      style_code: "CW2288-111",
      colorway: "White/White",
      size: "10",
      category: "Sneakers",
      subcategory: "Basketball shoes",
      identification_method: "visual_and_text",
      confidence: 0.95,
      identification_details: ["Swoosh on side panel", "Tongue label"],
      alternative_possibilities: ["Air Force 1 Mid"],
    });
  });

  it("defaults missing optional fields to empty values", () => {
    const result = parseIdentification('```json\n{"exactModelName": "iPhone 12", "brand": "Apple", "category": "electronics"}\n```');

    expect(result?.style_code).toBe("");
    expect(result?.identification_details).toEqual([]);
    expect(result?.category).toBe("Electronics");
    expect(result?.confidence).toBe(0.5);
  });

  it("normalizes percentage confidence", () => {
    const result = parseIdentification('{"exactModelName": "Walkman", "brand": "Sony", "confidence": 85}');
    expect(result?.confidence).toBeCloseTo(0.85, 6);
  });

  it("recovers fields from malformed JSON", () => {
    const truncated = '{"exactModelName": "Stan Smith", "brand": "Adidas", "size": "9", "colorway": "Green", "category": "sneakers", "identificationDetails": ["Perfor';

    const result = parseIdentification(truncated);

    expect(result).toMatchObject({
      exact_model_name: "Stan Smith",
      brand: "Adidas",
      size: "9",
      colorway: "Green",
      category: "Sneakers",
      identification_method: "visual_only",
      confidence: 0.7,
      identification_details: ["Extracted from partial JSON response"],
    });
  });

  it("defaults an unreadable prose reply to Unknown Product", () => {
    expect(parseIdentification("I cannot identify this item.")).toEqual({
      exact_model_name: "Unknown Product",
      brand: "",
      product_line: "",
      style_variant: "",
      style_code: "",
      colorway: "",
      size: "",
      category: "Other",
      subcategory: "",
      identification_method: "visual_only",
      confidence: 0.7,
      identification_details: ["Extracted from partial JSON response"],
      alternative_possibilities: [],
    });
  });

  it("recovers what it can from JSON without a name or brand", () => {
    const result = parseIdentification('{"category": "toys"}');
    expect(result.exact_model_name).toBe("Unknown Product");
    expect(result.category).toBe("Toys");
    expect(result.identification_method).toBe("visual_only");
  });

  it("treats JSON of the wrong shape as a partial reply", () => {
    const result = parseIdentification("[1, 2]");
    expect(result.exact_model_name).toBe("Unknown Product");
    expect(result.confidence).toBe(0.7);
  });

  it("names a brand-only identification Unknown Product", () => {
    expect(parseIdentification('{"brand": "Lego"}').exact_model_name).toBe("Unknown Product");
  });
});

describe("parsePartialIdentification", () => {
  it("uses Unknown Product when only the brand is present", () => {
    const result = parsePartialIdentification('{"brand": "Guess", "size": "M"');
    expect(result.exact_model_name).toBe("Unknown Product");
    expect(result.brand).toBe("Guess");
    expect(result.category).toBe("Other");
  });
});

describe("fixed identifications", () => {
  it("builds the low-confidence fallback", () => {
    const fallback = createFallbackIdentification();
    expect(fallback.exact_model_name).toBe("Product");
    expect(fallback.brand).toBe("Unknown");
    expect(fallback.identification_method).toBe("category_based");
    expect(fallback.confidence).toBe(0.3);
    expect(fallback.identification_details).toEqual(["Basic visual analysis"]);
  });

  it("builds a barcode identification", () => {
    const result = createBarcodeIdentification(" 0012345678905 ");
    expect(result.exact_model_name).toBe("Scanned Product");
    expect(result.style_code).toBe("0012345678905");
    expect(result.identification_method).toBe("barcode");
    expect(result.confidence).toBe(0.6);
    expect(result.identification_details).toEqual(["Identified by barcode: 0012345678905"]);
  });
});
