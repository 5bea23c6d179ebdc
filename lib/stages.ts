import { Mat4, Vec3, Vec4 } from "./math"
import { EDGE_SCALE } from "./shaders"
import { skinTransform, type VertexSkin } from "./skinning"
import type { UniformBlock } from "./uniforms"

/**
 * CPU evaluation of the three GPU stages. Each function follows its WGSL
 * counterpart in shaders.ts statement for statement and reads the same packed
 * uniform blocks, so it is used for picking, bounds and conformance tests.
 */

export type Sampler2D = (u: number, v: number) => Vec4

export interface StageVertex {
  position: Vec3
  normal: Vec3
  uv: [number, number]
  edgeScale: number
  skin: VertexSkin
}

export interface VertexStageOutput {
  position: Vec4 // clip space
  viewPosition: Vec4 // deformed, before any extrusion
}

export interface ColorVaryings extends VertexStageOutput {
  normal: Vec3
  uv: [number, number]
}

export interface ColorTextures {
  diffuse: Sampler2D
  sphere: Sampler2D
  toon: Sampler2D
}

export interface ColorStageOptions {
  normalSpecular?: boolean
}

export const whiteSampler: Sampler2D = () => new Vec4(1, 1, 1, 1)

function deformedViewPosition(frame: UniformBlock, vertex: Vec3, transform: Mat4): Vec4 {
  return frame.getMat4("uModelViewM").transform(transform.transform(new Vec4(vertex.x, vertex.y, vertex.z, 1)))
}

export function toClip(frame: UniformBlock, viewPosition: Vec4): Vec4 {
  const clip = frame.getMat4("uProjectionM").transform(viewPosition)
  clip.z = 0.5 * (clip.z + clip.w)
  return clip
}

// Depth-buffer value the rasterizer stores for a clip position
export function windowDepth(clip: Vec4): number {
  return clip.z / clip.w
}

export function colorVertexStage(vertex: StageVertex, frame: UniformBlock, bones: Float32Array): ColorVaryings {
  const transform = skinTransform(vertex.skin, bones)
  const viewPosition = deformedViewPosition(frame, vertex.position, transform)
  const n = vertex.normal
  const normal = frame
    .getMat4("uITModelViewM")
    .transform(transform.transform(new Vec4(n.x, n.y, n.z, 0)))
    .xyz()
    .normalize()
  return { position: toClip(frame, viewPosition), viewPosition, normal, uv: vertex.uv }
}

export function colorFragmentStage(
  input: ColorVaryings,
  frame: UniformBlock,
  material: UniformBlock,
  textures: ColorTextures,
  options: ColorStageOptions = {}
): Vec4 {
  const n = input.normal.normalize()
  const p = input.viewPosition.xyz()
  const [u, v] = input.uv

  const texColor = textures.diffuse(u, v)
  const sphereColor = textures.sphere(u, v).xyz()

  let rgb = texColor.xyz()
  const alpha = texColor.w
  const sphereMode = material.getFloat("uSphereTextureMode")
  if (sphereMode === 1.0) {
    rgb = rgb.multiply(sphereColor)
  } else if (sphereMode === 3.0) {
    rgb = rgb.add(sphereColor)
  }

  const l = frame.getVec3("uLightPosition").subtract(p).normalize()
  const view = frame.getVec3("uCameraPosition").subtract(p).normalize()
  const h = l.add(view).normalize()
  const specularBase = options.normalSpecular ? n : p

  const ambient = frame.getVec3("uLightAmbient").multiply(material.getVec3("uAmbientColor"))
  const diffuse = frame
    .getVec3("uLightDiffuse")
    .multiply(material.getVec3("uDiffuseColor"))
    .scale(Math.max(n.dot(l), 0))
  const specular = frame
    .getVec3("uLightSpecular")
    .multiply(material.getVec3("uSpecularColor"))
    .scale(Math.pow(Math.max(specularBase.dot(h), 0), material.getFloat("uShininess")))
  rgb = rgb.multiply(ambient.add(diffuse).add(specular)).clamp(0, 1)

  if (material.getFloat("uIsToonTexture") === 2.0) {
    const toonColor = textures.toon(0, 0.5 * (1 - l.dot(n))).xyz()
    rgb = rgb.multiply(toonColor)
  }

  return new Vec4(rgb.x, rgb.y, rgb.z, material.getFloat("uAlpha") * alpha)
}

export function edgeVertexStage(
  vertex: StageVertex,
  frame: UniformBlock,
  material: UniformBlock,
  bones: Float32Array
): VertexStageOutput {
  const transform = skinTransform(vertex.skin, bones)
  const viewPosition = deformedViewPosition(frame, vertex.position, transform)
  const extruded = deformedViewPosition(frame, vertex.position.add(vertex.normal), transform)
  const delta = extruded.xyz().subtract(viewPosition.xyz())
  const direction = delta.length() > 0 ? delta.normalize() : new Vec3(0, 0, 0)
  const offset = direction.scale(material.getFloat("uEdgeSize") * vertex.edgeScale * EDGE_SCALE)
  return {
    position: toClip(frame, viewPosition.add(new Vec4(offset.x, offset.y, offset.z, 0))),
    viewPosition,
  }
}

export function edgeFragmentStage(material: UniformBlock): Vec4 {
  const edge = material.getVec4("uEdgeColor")
  return new Vec4(edge.x, edge.y, edge.z, edge.w * material.getFloat("uAlpha"))
}

export function depthVertexStage(vertex: StageVertex, frame: UniformBlock, bones: Float32Array): VertexStageOutput {
  const viewPosition = deformedViewPosition(frame, vertex.position, skinTransform(vertex.skin, bones))
  return { position: toClip(frame, viewPosition), viewPosition }
}

// Linear eye depth over far, for a depth-buffer value in [0, 1]
export function linearizeDepth(depth: number, near: number, far: number): number {
  const ndcZ = depth * 2 - 1
  return (2 * near * far) / (far + near - ndcZ * (far - near))
}

export function depthFragmentStage(fragDepth: number, frame: UniformBlock): Vec4 {
  const far = frame.getFloat("uFar")
  const d = linearizeDepth(fragDepth, frame.getFloat("uNear"), far) / far
  return new Vec4(d, d, d, 1)
}
