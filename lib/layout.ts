export type VertexLayout = "indexed-bone" | "baked-transform"

export type StageKind = "color" | "edge" | "depth"

export interface IndexedBoneSkinning {
  layout: "indexed-bone"
  boneIndices: Uint16Array // 4 per vertex
  boneWeights: Float32Array // 4 per vertex, sum 1.0 or all zero
}

export interface BakedTransformSkinning {
  layout: "baked-transform"
  transforms: Float32Array // 16 per vertex, column-major mat4
}

export type Skinning = IndexedBoneSkinning | BakedTransformSkinning

export interface VertexStreams {
  positions: Float32Array // 3 per vertex
  normals: Float32Array // 3 per vertex
  uvs: Float32Array // 2 per vertex
  edgeScales: Float32Array // 1 per vertex
  skinning: Skinning
}

export class LayoutMismatchError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "LayoutMismatchError"
  }
}

// Shader locations; the baked transform columns reuse the skinning slots
export const ATTRIBUTE_LOCATIONS = {
  aVertex: 0,
  aNormal: 1,
  aUV: 2,
  aEdgeScale: 3,
  aBoneIndex: 4,
  aBoneWeights: 5,
  aTransform0: 4,
  aTransform1: 5,
  aTransform2: 6,
  aTransform3: 7,
} as const

// Interleaved base stream: position(3) normal(3) uv(2) edgeScale(1)
export const BASE_STRIDE = 9

const BASE_OFFSETS: Record<"aVertex" | "aNormal" | "aUV" | "aEdgeScale", number> = {
  aVertex: 0,
  aNormal: 3,
  aUV: 6,
  aEdgeScale: 8,
}

const BASE_FORMATS: Record<"aVertex" | "aNormal" | "aUV" | "aEdgeScale", GPUVertexFormat> = {
  aVertex: "float32x3",
  aNormal: "float32x3",
  aUV: "float32x2",
  aEdgeScale: "float32",
}

// Base attributes each stage consumes, besides the skinning attributes
export const STAGE_ATTRIBUTES: Record<StageKind, ("aVertex" | "aNormal" | "aUV" | "aEdgeScale")[]> = {
  color: ["aVertex", "aNormal", "aUV"],
  edge: ["aVertex", "aNormal", "aEdgeScale"],
  depth: ["aVertex"],
}

export function vertexCountOf(streams: VertexStreams): number {
  return streams.positions.length / 3
}

function expectLength(name: string, actual: number, expected: number) {
  if (actual !== expected) {
    throw new LayoutMismatchError(`Stream "${name}" has ${actual} components, expected ${expected}`)
  }
}

/**
 * Checks that the streams match the layout variant the pipelines were built
 * for, and that every stream covers the same number of vertices.
 * Returns the vertex count.
 */
export function validateStreams(streams: VertexStreams, expected: VertexLayout): number {
  if (streams.skinning.layout !== expected) {
    throw new LayoutMismatchError(
      `Vertex streams use the "${streams.skinning.layout}" layout but the pipeline expects "${expected}"`
    )
  }
  if (streams.positions.length % 3 !== 0) {
    throw new LayoutMismatchError(`Stream "aVertex" length ${streams.positions.length} is not a multiple of 3`)
  }
  const count = vertexCountOf(streams)
  expectLength("aNormal", streams.normals.length, count * 3)
  expectLength("aUV", streams.uvs.length, count * 2)
  expectLength("aEdgeScale", streams.edgeScales.length, count)

  const skinning = streams.skinning
  if (skinning.layout === "indexed-bone") {
    expectLength("aBoneIndex", skinning.boneIndices.length, count * 4)
    expectLength("aBoneWeights", skinning.boneWeights.length, count * 4)
  } else {
    expectLength("aTransform", skinning.transforms.length, count * 16)
  }
  return count
}

export function interleaveBaseStream(streams: VertexStreams): Float32Array<ArrayBuffer> {
  const count = vertexCountOf(streams)
  const out = new Float32Array(count * BASE_STRIDE)
  for (let i = 0; i < count; i++) {
    const o = i * BASE_STRIDE
    out[o] = streams.positions[i * 3]
    out[o + 1] = streams.positions[i * 3 + 1]
    out[o + 2] = streams.positions[i * 3 + 2]
    out[o + 3] = streams.normals[i * 3]
    out[o + 4] = streams.normals[i * 3 + 1]
    out[o + 5] = streams.normals[i * 3 + 2]
    out[o + 6] = streams.uvs[i * 2]
    out[o + 7] = streams.uvs[i * 2 + 1]
    out[o + 8] = streams.edgeScales[i]
  }
  return out
}

/**
 * Vertex buffer slots, identical for every stage so one set of bound buffers
 * serves the whole frame:
 *   slot 0: interleaved base stream
 *   indexed-bone:    slot 1 bone indices (uint16x4), slot 2 bone weights (float32x4)
 *   baked-transform: slot 1 transform columns (4 x float32x4)
 * Each stage only declares the attributes it reads.
 */
export function vertexBufferLayouts(layout: VertexLayout, stage: StageKind): GPUVertexBufferLayout[] {
  const base: GPUVertexBufferLayout = {
    arrayStride: BASE_STRIDE * 4,
    attributes: STAGE_ATTRIBUTES[stage].map((name) => ({
      shaderLocation: ATTRIBUTE_LOCATIONS[name],
      offset: BASE_OFFSETS[name] * 4,
      format: BASE_FORMATS[name],
    })),
  }

  if (layout === "indexed-bone") {
    return [
      base,
      {
        arrayStride: 4 * 2,
        attributes: [{ shaderLocation: ATTRIBUTE_LOCATIONS.aBoneIndex, offset: 0, format: "uint16x4" }],
      },
      {
        arrayStride: 4 * 4,
        attributes: [{ shaderLocation: ATTRIBUTE_LOCATIONS.aBoneWeights, offset: 0, format: "float32x4" }],
      },
    ]
  }

  return [
    base,
    {
      arrayStride: 16 * 4,
      attributes: [
        { shaderLocation: ATTRIBUTE_LOCATIONS.aTransform0, offset: 0, format: "float32x4" },
        { shaderLocation: ATTRIBUTE_LOCATIONS.aTransform1, offset: 4 * 4, format: "float32x4" },
        { shaderLocation: ATTRIBUTE_LOCATIONS.aTransform2, offset: 8 * 4, format: "float32x4" },
        { shaderLocation: ATTRIBUTE_LOCATIONS.aTransform3, offset: 12 * 4, format: "float32x4" },
      ],
    },
  ]
}
