import { LayoutMismatchError, type VertexStreams } from "./layout"
import { Mat4, Vec4 } from "./math"

// Bone capacity used when a model does not declare its bone count
export const DEFAULT_BONE_COUNT = 200

// Deformation input of a single vertex, in either layout variant
export type VertexSkin =
  | {
      layout: "indexed-bone"
      boneIndex: [number, number, number, number]
      boneWeights: [number, number, number, number]
    }
  | {
      layout: "baked-transform"
      transform: Mat4
    }

export function boneCountOf(bones: Float32Array): number {
  if (bones.length % 16 !== 0) {
    throw new LayoutMismatchError(`Bone transform set length ${bones.length} is not a multiple of 16`)
  }
  return bones.length / 16
}

// Out-of-range indices read the last bone, like a clamped storage access on the GPU
export function boneMatrix(bones: Float32Array, index: number): Mat4 {
  const count = bones.length / 16
  if (count === 0) return Mat4.identity()
  const clamped = Math.min(Math.max(0, Math.floor(index)), count - 1)
  return Mat4.fromArray(bones, clamped * 16)
}

/**
 * Linear-blend skinning: the weighted sum of up to four bone matrices.
 * A weight sum of exactly 0.0 marks a static vertex and yields identity.
 */
export function skinTransform(skin: VertexSkin, bones: Float32Array): Mat4 {
  if (skin.layout === "baked-transform") {
    return skin.transform
  }

  const w = skin.boneWeights
  const weightSum = w[0] + w[1] + w[2] + w[3]
  if (weightSum === 0.0) {
    return Mat4.identity()
  }

  let transform = Mat4.zero()
  for (let i = 0; i < 4; i++) {
    transform = transform.add(boneMatrix(bones, skin.boneIndex[i]).scale(w[i]))
  }
  return transform
}

export function readVertexSkin(streams: VertexStreams, vertex: number): VertexSkin {
  const skinning = streams.skinning
  if (skinning.layout === "baked-transform") {
    const o = vertex * 16
    return {
      layout: "baked-transform",
      transform: Mat4.fromColumns(
        Vec4.fromArray(skinning.transforms, o),
        Vec4.fromArray(skinning.transforms, o + 4),
        Vec4.fromArray(skinning.transforms, o + 8),
        Vec4.fromArray(skinning.transforms, o + 12)
      ),
    }
  }

  const o = vertex * 4
  const idx = skinning.boneIndices
  const wts = skinning.boneWeights
  return {
    layout: "indexed-bone",
    boneIndex: [idx[o], idx[o + 1], idx[o + 2], idx[o + 3]],
    boneWeights: [wts[o], wts[o + 1], wts[o + 2], wts[o + 3]],
  }
}

/**
 * CPU-side skinning for the baked-transform layout: one blended matrix per
 * vertex, packed as 16 floats in column order (the four aTransform columns).
 */
export function bakeVertexTransforms(streams: VertexStreams, bones: Float32Array): Float32Array<ArrayBuffer> {
  if (streams.skinning.layout !== "indexed-bone") {
    throw new LayoutMismatchError("Baking vertex transforms needs bone indices and weights")
  }
  boneCountOf(bones)

  const count = streams.positions.length / 3
  const out = new Float32Array(count * 16)
  for (let i = 0; i < count; i++) {
    out.set(skinTransform(readVertexSkin(streams, i), bones).values, i * 16)
  }
  return out
}
