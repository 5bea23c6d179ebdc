import type { Environment } from "./environment"
import { LayoutMismatchError, type StageKind, type VertexLayout } from "./layout"
import type { Material } from "./material"
import type { MaterialRange } from "./model"
import { boneCountOf } from "./skinning"
import { FRAME_UNIFORMS, UniformBlock } from "./uniforms"

// Logical pass order within a frame
export const PASS_ORDER: readonly StageKind[] = ["depth", "edge", "color"]

export interface FrameOptions {
  passes?: StageKind[] // default: edge + color
}

// Per-frame deformation input; its layout must match the loaded model
export type FrameSkinning =
  | { layout: "indexed-bone"; boneTransforms: Float32Array }
  | { layout: "baked-transform"; vertexTransforms?: Float32Array }

export interface FrameTarget {
  layout: VertexLayout
  boneCount: number
  vertexCount: number
}

/**
 * Immutable inputs of one frame. Every pass reads this snapshot, so caller
 * updates to bones or the environment after it is taken only affect the next frame.
 */
export interface FrameSnapshot {
  readonly layout: VertexLayout
  readonly frameUniforms: UniformBlock
  readonly boneTransforms: Float32Array<ArrayBuffer> | null
  readonly vertexTransforms: Float32Array<ArrayBuffer> | null
  readonly passes: readonly StageKind[]
}

export function orderPasses(passes: readonly StageKind[]): StageKind[] {
  return PASS_ORDER.filter((pass) => passes.includes(pass))
}

export function takeSnapshot(
  environment: Environment,
  skinning: FrameSkinning,
  target: FrameTarget,
  options: FrameOptions = {}
): FrameSnapshot {
  if (skinning.layout !== target.layout) {
    throw new LayoutMismatchError(
      `Frame supplies "${skinning.layout}" deformation but the model was loaded with "${target.layout}"`
    )
  }

  let boneTransforms: Float32Array<ArrayBuffer> | null = null
  let vertexTransforms: Float32Array<ArrayBuffer> | null = null
  if (skinning.layout === "indexed-bone") {
    const count = boneCountOf(skinning.boneTransforms)
    if (count !== target.boneCount) {
      throw new LayoutMismatchError(`Frame supplies ${count} bone transforms, the model has ${target.boneCount}`)
    }
    boneTransforms = Float32Array.from(skinning.boneTransforms)
  } else if (skinning.vertexTransforms) {
    if (skinning.vertexTransforms.length !== target.vertexCount * 16) {
      throw new LayoutMismatchError(
        `Frame supplies ${skinning.vertexTransforms.length / 16} vertex transforms, the model has ${target.vertexCount} vertices`
      )
    }
    vertexTransforms = Float32Array.from(skinning.vertexTransforms)
  }

  const frameUniforms = new UniformBlock(FRAME_UNIFORMS)
  environment.writeFrameUniforms(frameUniforms)

  return Object.freeze({
    layout: target.layout,
    frameUniforms,
    boneTransforms,
    vertexTransforms,
    passes: Object.freeze(orderPasses(options.passes ?? ["edge", "color"])),
  })
}

export interface PassDraw {
  stage: StageKind
  cullMode: GPUCullMode
  materialIndex: number
  firstIndex: number
  count: number
}

// Color and depth honor double-sided materials; edges are drawn as an inverted hull
export function cullModeFor(stage: StageKind, material: Material): GPUCullMode {
  if (stage === "edge") return "front"
  return material.doubleSided ? "none" : "back"
}

export function planFrame(
  passes: readonly StageKind[],
  ranges: readonly MaterialRange[],
  materials: readonly Material[]
): PassDraw[] {
  const draws: PassDraw[] = []
  for (const stage of orderPasses(passes)) {
    for (const range of ranges) {
      const material = materials[range.materialIndex]
      if (stage === "edge" && !material.edgeEnabled) continue
      draws.push({
        stage,
        cullMode: cullModeFor(stage, material),
        materialIndex: range.materialIndex,
        firstIndex: range.firstIndex,
        count: range.count,
      })
    }
  }
  return draws
}
