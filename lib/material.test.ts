import { describe, expect, it } from "vitest"
import {
  effectiveSphereMode,
  effectiveToonMode,
  SphereMode,
  ToonMode,
  toSphereMode,
  writeMaterialUniforms,
  type Material,
} from "./material"
import { MATERIAL_UNIFORMS, UniformBlock } from "./uniforms"

const material: Material = {
  name: "skin",
  diffuse: [0.8, 0.6, 0.4, 0.5],
  specular: [0.1, 0.2, 0.3],
  ambient: [0.25, 0.25, 0.25],
  shininess: 8,
  diffuseTextureIndex: 0,
  sphereTextureIndex: 1,
  sphereMode: SphereMode.Add,
  toonTextureIndex: 2,
  doubleSided: false,
  edgeEnabled: true,
  edgeColor: [0, 0, 0, 1],
  edgeSize: 1,
  vertexCount: 3,
}

describe("material modes", () => {
  it("maps unsupported sphere values to off", () => {
    expect(toSphereMode(1)).toBe(SphereMode.Multiply)
    expect(toSphereMode(3)).toBe(SphereMode.Add)
    expect(toSphereMode(2)).toBe(SphereMode.Off)
    expect(toSphereMode(7)).toBe(SphereMode.Off)
  })

  it("derives the toon flag from the toon texture", () => {
    expect(effectiveToonMode({ hasSphereTexture: false, hasToonTexture: true })).toBe(ToonMode.Ramp)
    expect(effectiveToonMode({ hasSphereTexture: false, hasToonTexture: false })).toBe(ToonMode.None)
  })

  it("turns modes off when the texture is missing", () => {
    expect(effectiveSphereMode(material, { hasSphereTexture: false, hasToonTexture: true })).toBe(SphereMode.Off)
    expect(effectiveSphereMode(material, { hasSphereTexture: true, hasToonTexture: true })).toBe(SphereMode.Add)
    expect(effectiveToonMode({ hasSphereTexture: true, hasToonTexture: false })).toBe(ToonMode.None)
  })
})

describe("writeMaterialUniforms", () => {
  it("packs the material into the uniform block", () => {
    const block = new UniformBlock(MATERIAL_UNIFORMS)
    writeMaterialUniforms(block, material, { hasSphereTexture: true, hasToonTexture: true })

    expect(block.getFloat("uAlpha")).toBe(0.5)
    expect(block.getFloat("uShininess")).toBe(8)
    expect(block.getFloat("uSphereTextureMode")).toBe(3)
    expect(block.getFloat("uIsToonTexture")).toBe(2)
    expect(block.getFloat("uEdgeSize")).toBe(1)
    expect(block.getVec4("uEdgeColor").toArray()).toEqual([0, 0, 0, 1])
    expect(block.getVec3("uAmbientColor").toArray()).toEqual([0.25, 0.25, 0.25])
    const diffuse = block.getVec3("uDiffuseColor")
    expect(diffuse.x).toBeCloseTo(0.8)
    expect(diffuse.z).toBeCloseTo(0.4)
  })

  it("writes a reserved sphere mode from a loader as off", () => {
    const parsed: number = 2
    const block = new UniformBlock(MATERIAL_UNIFORMS)
    writeMaterialUniforms(block, { ...material, sphereMode: parsed }, { hasSphereTexture: true, hasToonTexture: true })
    expect(block.getFloat("uSphereTextureMode")).toBe(0)
  })

  it("writes zero modes for a material without sphere or toon textures", () => {
    const block = new UniformBlock(MATERIAL_UNIFORMS)
    writeMaterialUniforms(block, material, { hasSphereTexture: false, hasToonTexture: false })
    expect(block.getFloat("uSphereTextureMode")).toBe(0)
    expect(block.getFloat("uIsToonTexture")).toBe(0)
  })
})
