import { describe, expect, it } from "vitest";
import { createBridgeAssessmentToolDefinition } from "./bridge-assessment.js";

const params = {
  bridge_type: "simply_supported",
  span_length: 2,
  material: "steel",
  grade: "S355",
  flange_width: 300,
  flange_thickness: 20,
  web_thickness: 10,
  beam_depth: 640,
  loading_type: "HA",
  loaded_width: 3.65,
  lane_width: 3.65,
  condition_factor: 1,
};

describe("bridge_assessment tool", () => {
  const tool = createBridgeAssessmentToolDefinition();

  it("describes its parameters as a JSON schema", () => {
    expect(tool.name).toBe("bridge_assessment");
    expect(tool.parameters.type).toBe("object");
    expect(tool.parameters.required).toContain("condition_factor");
    expect(tool.parameters.properties.vehicle_type.enum).toEqual([
      "none",
      "custom",
      "3 tonne",
      "7.5 tonne",
      "18 tonne",
    ]);
  });

  it("returns a text summary and the structured record", async () => {
    const result = await tool.execute("call-1", params);
    expect(result.details.ok).toBe(true);
    expect(result.details.result).toBe("Pass");
    expect(result.content).toHaveLength(2);
    const summary = result.content[0]?.text ?? "";
    expect(summary.split("\n")[0]).toBe("Bridge Assessment: simply supported | Span: 2 m");
    expect(summary.split("\n").at(-1)).toBe("Result: Pass");
    expect(JSON.parse(result.content[1]?.text ?? "{}")).toEqual(result.details.record);
  });

  it("reports an error outcome without throwing", async () => {
    const result = await tool.execute("call-2", { ...params, axle_spacing: 5, vehicle_type: "3 tonne" });
    expect(result.details.ok).toBe(false);
    expect(result.details.result).toBe("Error");
    expect(result.content[0]?.text).toBe(
      "Bridge Assessment: ERROR (InvalidVehicleSpacingError [axle_spacing])\n" +
        "axle_spacing (5 m) must be less than span_length (2 m) for both axles to fit on the span.",
    );
    expect(result.details.record).toEqual({
      Error: "axle_spacing (5 m) must be less than span_length (2 m) for both axles to fit on the span.",
    });
  });

  it("treats missing arguments as an empty parameter set", async () => {
    const result = await tool.execute("call-3", undefined);
    expect(result.details.ok).toBe(false);
    expect(result.details.record).toEqual({ Error: "bridge_type is required." });
  });
});
