/**
 * Listing copy helpers: title, keywords, description, category path.
 */

import type { PrecisionIdentificationResult, ProductCategory } from "@/types/analysis";
import type { ConditionAssessment, ItemCondition } from "@/types/market";

const MAX_TITLE_LENGTH = 80;

const CATEGORY_PATHS: Record<ProductCategory, string> = {
  Sneakers: "Clothing, Shoes & Accessories > Unisex Shoes",
  Clothing: "Clothing, Shoes & Accessories",
  Electronics: "Consumer Electronics",
  Accessories: "Clothing, Shoes & Accessories > Accessories",
  Home: "Home & Garden",
  Collectibles: "Collectibles",
  Books: "Books & Magazines",
  Toys: "Toys & Hobbies",
  Sports: "Sporting Goods",
  Other: "Everything Else",
};

const CONDITION_BLURBS: Record<ItemCondition, string> = {
  "New with tags": "Brand new, unused, with original tags attached.",
  "New without tags": "Brand new and unused, tags removed.",
  "New other": "New and unused, may be missing original packaging.",
  "Like New": "Worn or used once or twice with no visible flaws.",
  Excellent: "Lightly used with minimal signs of wear.",
  "Very Good": "Used with minor signs of wear.",
  Good: "Used with normal signs of wear.",
  Acceptable: "Heavily used with visible wear; fully functional.",
  "For parts or not working": "Sold as-is for parts or repair.",
};

export function mapToMarketplaceCategory(category: ProductCategory): string {
  return CATEGORY_PATHS[category];
}

export function createOptimizedTitle(
  identification: PrecisionIdentificationResult,
  condition: ItemCondition
): string {
  let title = identification.exact_model_name;

  if (identification.brand && !title.includes(identification.brand)) {
    title = `${identification.brand} ${title}`;
  }
  if (identification.style_code) {
    title += ` ${identification.style_code}`;
  }
  if (identification.size) {
    title += ` Size ${identification.size}`;
  }
  title += ` - ${condition}`;

  if (title.length > MAX_TITLE_LENGTH) {
    title = `${title.slice(0, MAX_TITLE_LENGTH - 3)}...`;
  }
  return title;
}

export function createKeywords(identification: PrecisionIdentificationResult): string[] {
  const keywords: string[] = [];
  if (identification.brand) keywords.push(identification.brand);
  if (identification.product_line) keywords.push(identification.product_line);
  if (identification.style_code) keywords.push(identification.style_code);
  keywords.push(identification.category);
  if (identification.colorway) keywords.push(identification.colorway);
  return keywords;
}

export function createDescriptionTemplate(
  identification: PrecisionIdentificationResult,
  assessment: ConditionAssessment
): string {
  const condition = assessment.detected_condition;
  return [
    identification.exact_model_name,
    "",
    `Condition: ${condition}`,
    CONDITION_BLURBS[condition],
    "",
    "Product Details:",
    `• Brand: ${identification.brand}`,
    `• Model: ${identification.exact_model_name}`,
    `• Style Code: ${identification.style_code}`,
    `• Size: ${identification.size}`,
    `• Colorway: ${identification.colorway}`,
    "",
    "Condition Notes:",
    ...assessment.condition_notes,
    "",
    "Fast shipping and excellent customer service!",
    "Questions? Message us anytime.",
  ].join("\n");
}
