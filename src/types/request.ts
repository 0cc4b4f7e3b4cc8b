export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export interface DesignRequest {
  requesterId: string;
  prompt: string;
  // Jurisdiction or locale tag the compliance rules are drawn from, e.g. "mumbai"
  jurisdiction: string;
  correlationId?: string;
  context: JsonObject;
}

// Output of the generation step. Never inspected by the pipeline.
export type DesignArtifact = JsonObject;
