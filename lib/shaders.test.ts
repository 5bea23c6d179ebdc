import { describe, expect, it } from "vitest"
import type { StageKind, VertexLayout } from "./layout"
import { buildShaderSource, EDGE_SCALE, NORMAL_SPECULAR_CONSTANT, skinChunk } from "./shaders"

const stages: StageKind[] = ["color", "edge", "depth"]
const layouts: VertexLayout[] = ["indexed-bone", "baked-transform"]

function count(source: string, needle: string): number {
  return source.split(needle).length - 1
}

describe("buildShaderSource", () => {
  it("defines the deformation once for every stage and layout", () => {
    for (const layout of layouts) {
      for (const stage of stages) {
        const source = buildShaderSource(stage, layout)
        expect(count(source, "fn skinTransform(")).toBe(1)
        expect(count(source, "fn deformedViewPosition(")).toBe(1)
        expect(count(source, "@vertex fn vs(")).toBe(1)
        expect(count(source, "@fragment fn fs(")).toBe(1)
      }
    }
  })

  it("declares the uniform structs from the packed layouts", () => {
    const source = buildShaderSource("color", "indexed-bone")
    expect(source).toContain("struct FrameUniforms {\n  uProjectionM: mat4x4f,")
    expect(source).toContain("  uEdgeSize: f32,\n};")
    expect(source).toContain("@group(0) @binding(1) var<storage, read> uBoneTransform: array<mat4x4f>;")
  })

  it("reads bone indices and weights in the indexed-bone layout", () => {
    const chunk = skinChunk("indexed-bone")
    expect(chunk).toContain("@location(4) aBoneIndex: vec4<u32>,")
    expect(chunk).toContain("@location(5) aBoneWeights: vec4f,")
    expect(chunk).toContain("if (weightSum == 0.0) {")
  })

  it("reads four transform columns in the baked-transform layout", () => {
    const chunk = skinChunk("baked-transform")
    expect(chunk).toContain("@location(4) aTransform0: vec4f,")
    expect(chunk).toContain("@location(7) aTransform3: vec4f,")
    expect(chunk).not.toContain("uBoneTransform")
  })

  it("exposes the specular compatibility switch only in the color stage", () => {
    expect(buildShaderSource("color", "indexed-bone")).toContain(`override ${NORMAL_SPECULAR_CONSTANT}: bool = false;`)
    expect(buildShaderSource("edge", "indexed-bone")).not.toContain("override")
    expect(buildShaderSource("depth", "indexed-bone")).not.toContain("override")
  })

  it("marks every clip position invariant so the passes depth-test equal", () => {
    for (const layout of layouts) {
      for (const stage of stages) {
        const source = buildShaderSource(stage, layout)
        expect(count(source, "@invariant @builtin(position)")).toBe(1)
        expect(count(source, "@builtin(position)")).toBe(stage === "depth" ? 2 : 1)
      }
    }
    expect(buildShaderSource("color", "indexed-bone")).toContain("  @invariant @builtin(position) position: vec4f,")
  })

  it("guards the outline direction against a zero-length normal", () => {
    const source = buildShaderSource("edge", "indexed-bone")
    expect(source).toContain("let direction = select(vec3f(0.0), normalize(delta), length(delta) > 0.0);")
    expect(source).not.toContain("normalize(extruded.xyz - viewPosition.xyz)")
  })

  it("bakes the outline scale into the edge stage", () => {
    expect(EDGE_SCALE).toBe(0.05)
    expect(buildShaderSource("edge", "baked-transform")).toContain("const EDGE_SCALE: f32 = 0.05;")
  })

  it("linearizes depth against the frame near and far planes", () => {
    const source = buildShaderSource("depth", "indexed-bone")
    expect(source).toContain("let zNear = frame.uNear;")
    expect(source).toContain("let d = linearDepth / zFar;")
  })
})
