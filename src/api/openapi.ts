const regionInput = {
  type: "object",
  required: ["country"],
  properties: {
    country: { type: "string", description: "ISO-3166-1 alpha-2 code" },
    subdivision: { type: ["string", "null"], description: "ISO-3166-2 code or its suffix" }
  }
};

const scenarioBody = {
  type: "object",
  required: ["source", "destination", "transactionType", "amount"],
  properties: {
    source: { $ref: "#/components/schemas/RegionInput" },
    destination: { $ref: "#/components/schemas/RegionInput" },
    transactionType: { type: "string", enum: ["B2B", "B2C"] },
    tradeAgreementOverride: {
      oneOf: [
        {
          type: "object",
          required: ["kind", "agreement"],
          properties: { kind: { const: "use_agreement" }, agreement: { type: "string" } }
        },
        {
          type: "object",
          required: ["kind"],
          properties: { kind: { const: "no_agreement" } }
        },
        { type: "null" }
      ]
    },
    isDigitalProductOrService: { type: "boolean", default: false },
    hasResaleCertificate: { type: "boolean", default: false },
    isBuyerRegistered: { type: "boolean", default: false },
    ignoreThreshold: { type: "boolean", default: false },
    vatRate: {
      type: ["string", "null"],
      enum: ["standard", "reduced", "reduced_alt", "super_reduced", "parking", "zero", "exempt", "reverse_charge", null]
    },
    amount: { type: ["number", "string"], description: "Non-negative amount; strings keep full precision" }
  }
};

const errorResponses = {
  "400": { description: "Validation error", content: { "application/json": { schema: { $ref: "#/components/schemas/ErrorResponse" } } } },
  "422": { description: "Processing error", content: { "application/json": { schema: { $ref: "#/components/schemas/ErrorResponse" } } } }
};

export function buildOpenApiDocument() {
  return {
    openapi: "3.1.0",
    info: {
      title: "Transaction Tax Engine API",
      version: "1.0.0",
      description: "Cross-border VAT, GST and sales tax evaluation."
    },
    servers: [
      {
        url: "/v1"
      }
    ],
    components: {
      schemas: {
        ErrorResponse: {
          type: "object",
          required: ["code", "message", "details", "requestId"],
          properties: {
            code: { type: "string" },
            message: { type: "string" },
            details: {},
            requestId: { type: ["string", "null"] }
          }
        },
        RegionInput: regionInput,
        TaxScenario: scenarioBody,
        RateLine: {
          type: "object",
          required: ["taxKind", "rate", "compound", "base", "amount"],
          properties: {
            taxKind: { type: "string" },
            rate: { type: "number" },
            compound: { type: "boolean" },
            base: { type: "number" },
            amount: { type: "number" }
          }
        }
      }
    },
    paths: {
      "/health": {
        get: {
          summary: "Health check",
          responses: {
            "200": {
              description: "Service health"
            }
          }
        }
      },
      "/tax/calculate": {
        post: {
          summary: "Calculate tax for one transaction",
          requestBody: {
            required: true,
            content: { "application/json": { schema: { $ref: "#/components/schemas/TaxScenario" } } }
          },
          responses: {
            "200": { description: "Tax amount, policy, applied rates and explanation" },
            ...errorResponses
          }
        }
      },
      "/tax/rates": {
        post: {
          summary: "Resolve the policy and applied rates for one transaction",
          requestBody: {
            required: true,
            content: { "application/json": { schema: { $ref: "#/components/schemas/TaxScenario" } } }
          },
          responses: {
            "200": { description: "Policy and rate lines" },
            ...errorResponses
          }
        }
      },
      "/tax/batches": {
        post: {
          summary: "Queue a batch of transactions for evaluation",
          responses: {
            "202": { description: "Batch accepted" },
            "400": errorResponses["400"]
          }
        }
      },
      "/tax/batches/{id}": {
        get: {
          summary: "Batch state and result",
          responses: {
            "200": { description: "Batch snapshot" },
            "404": { description: "Unknown batch" }
          }
        }
      },
      "/rates/{region}": {
        get: {
          summary: "Catalog entries for a region",
          responses: {
            "200": { description: "Rate entries" },
            "400": errorResponses["400"],
            "404": { description: "Region not in catalog" }
          }
        }
      },
      "/agreements": {
        get: {
          summary: "List trade agreements in classification order",
          responses: {
            "200": { description: "Agreement summaries" }
          }
        }
      },
      "/agreements/{key}": {
        get: {
          summary: "Trade agreement detail",
          responses: {
            "200": { description: "Agreement" },
            "404": { description: "Unknown agreement" }
          }
        }
      },
      "/regions/validate": {
        post: {
          summary: "Validate a country and subdivision pair",
          requestBody: {
            required: true,
            content: { "application/json": { schema: { $ref: "#/components/schemas/RegionInput" } } }
          },
          responses: {
            "200": { description: "Normalized region" },
            "400": errorResponses["400"]
          }
        }
      }
    }
  };
}
