export const EMAIL_CATEGORIES = [
  "quote_request",
  "order_placement",
  "order_inquiry",
  "product_inquiry",
  "technical_support",
  "shipping_inquiry",
  "billing_inquiry",
  "complaint",
  "regulatory_compliance",
  "sample_request",
  "general_inquiry",
  "spam",
] as const;

export type EmailCategory = (typeof EMAIL_CATEGORIES)[number];

export const PRIORITIES = ["low", "normal", "high", "urgent"] as const;

export type Priority = (typeof PRIORITIES)[number];

export const CATEGORY_DESCRIPTIONS: Record<EmailCategory, string> = {
  quote_request: "Customer requesting a price quote for one or more products",
  order_placement: "Customer placing a new order or ready to purchase",
  order_inquiry:
    "Customer asking about status, tracking, or details of an existing order",
  product_inquiry:
    "Customer asking questions about product specifications, availability, or information",
  technical_support:
    "Customer needs technical help with product application, formulation, or usage",
  shipping_inquiry:
    "Customer asking about shipping options, costs, delivery times, or logistics",
  billing_inquiry:
    "Customer has questions about invoices, payments, or account balance",
  complaint: "Customer expressing dissatisfaction or reporting an issue",
  regulatory_compliance:
    "Questions about certifications, regulatory compliance, safety data sheets, or documentation",
  sample_request:
    "Customer requesting product samples for testing or evaluation",
  general_inquiry:
    "General questions about the company, policies, or other topics",
  spam: "Unsolicited, irrelevant, or marketing emails not related to customer service",
};

const categoryNames: ReadonlySet<string> = new Set(EMAIL_CATEGORIES);
const priorityNames: ReadonlySet<string> = new Set(PRIORITIES);

export function isEmailCategory(value: unknown): value is EmailCategory {
  return typeof value === "string" && categoryNames.has(value);
}

export function isPriority(value: unknown): value is Priority {
  return typeof value === "string" && priorityNames.has(value);
}

/**
 * Raise "low" and "normal" one step; "high" and "urgent" are left alone.
 */
export function escalatePriority(priority: Priority): Priority {
  switch (priority) {
    case "low":
      return "normal";
    case "normal":
      return "high";
    default:
      return priority;
  }
}
