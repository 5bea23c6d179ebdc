import type { UniformBlock } from "./uniforms"

// Numbering follows the PMX asset convention and is written to the GPU as-is.
// 2 is reserved by the format and never produced here.
export enum SphereMode {
  Off = 0,
  Multiply = 1,
  Add = 3,
}

// 1 is reserved by the format and never produced here.
export enum ToonMode {
  None = 0,
  Ramp = 2,
}

export function toSphereMode(value: number): SphereMode {
  switch (value) {
    case SphereMode.Multiply:
      return SphereMode.Multiply
    case SphereMode.Add:
      return SphereMode.Add
    default:
      return SphereMode.Off
  }
}

export interface Texture {
  path: string
  width: number
  height: number
  data: Uint8Array // RGBA8, row-major, width * height * 4 bytes
}

export interface Material {
  name: string
  diffuse: [number, number, number, number] // rgb + alpha
  specular: [number, number, number]
  ambient: [number, number, number]
  shininess: number
  diffuseTextureIndex: number // -1 when absent
  sphereTextureIndex: number
  sphereMode: SphereMode
  toonTextureIndex: number
  doubleSided: boolean
  edgeEnabled: boolean
  edgeColor: [number, number, number, number]
  edgeSize: number
  vertexCount: number // number of indices drawn by this material
}

export interface MaterialTextureState {
  hasSphereTexture: boolean
  hasToonTexture: boolean
}

// The mode actually sent to the GPU: a reserved value or a mode without its texture is off
export function effectiveSphereMode(mat: Material, state: MaterialTextureState): SphereMode {
  return state.hasSphereTexture ? toSphereMode(mat.sphereMode) : SphereMode.Off
}

export function effectiveToonMode(state: MaterialTextureState): ToonMode {
  return state.hasToonTexture ? ToonMode.Ramp : ToonMode.None
}

export function writeMaterialUniforms(block: UniformBlock, mat: Material, state: MaterialTextureState): void {
  block.set("uAmbientColor", mat.ambient)
  block.set("uSpecularColor", mat.specular)
  block.set("uDiffuseColor", [mat.diffuse[0], mat.diffuse[1], mat.diffuse[2]])
  block.setFloat("uAlpha", mat.diffuse[3])
  block.setFloat("uShininess", mat.shininess)
  block.setFloat("uSphereTextureMode", effectiveSphereMode(mat, state))
  block.setFloat("uIsToonTexture", effectiveToonMode(state))
  block.set("uEdgeColor", mat.edgeColor)
  block.setFloat("uEdgeSize", mat.edgeSize)
}
