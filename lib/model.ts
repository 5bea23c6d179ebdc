import {
  interleaveBaseStream,
  LayoutMismatchError,
  validateStreams,
  type VertexLayout,
  type VertexStreams,
} from "./layout"
import type { Material, Texture } from "./material"
import { Vec3 } from "./math"
import { bakeVertexTransforms, DEFAULT_BONE_COUNT, readVertexSkin } from "./skinning"
import type { StageVertex } from "./stages"

export interface MaterialRange {
  materialIndex: number
  firstIndex: number
  count: number
}

/**
 * Static geometry of one character as handed over by an asset loader:
 * vertex streams in one layout variant, a triangle index list split into
 * consecutive per-material ranges, materials and their textures.
 */
export class Model {
  private streams: VertexStreams
  private vertexCount: number
  private indexData: Uint32Array<ArrayBuffer>
  private materials: Material[]
  private textures: Texture[]
  private boneCount: number
  private baseVertexData: Float32Array<ArrayBuffer> | null = null

  constructor(
    streams: VertexStreams,
    indexData: Uint32Array<ArrayBuffer>,
    materials: Material[],
    textures: Texture[] = [],
    boneCount: number = DEFAULT_BONE_COUNT
  ) {
    this.vertexCount = validateStreams(streams, streams.skinning.layout)
    this.streams = streams
    this.indexData = indexData
    this.materials = materials
    this.textures = textures
    this.boneCount = boneCount

    for (let i = 0; i < indexData.length; i++) {
      if (indexData[i] >= this.vertexCount) {
        throw new LayoutMismatchError(`Index ${indexData[i]} at ${i} exceeds vertex count ${this.vertexCount}`)
      }
    }
  }

  getLayout(): VertexLayout {
    return this.streams.skinning.layout
  }

  getStreams(): VertexStreams {
    return this.streams
  }

  getVertexCount(): number {
    return this.vertexCount
  }

  getIndices(): Uint32Array<ArrayBuffer> {
    return this.indexData
  }

  getMaterials(): Material[] {
    return this.materials
  }

  getTexture(index: number): Texture | null {
    return index >= 0 && index < this.textures.length ? this.textures[index] : null
  }

  getBoneCount(): number {
    return this.boneCount
  }

  // Interleaved [x,y,z, nx,ny,nz, u,v, edgeScale] per vertex for GPU upload
  getBaseVertices(): Float32Array<ArrayBuffer> {
    if (!this.baseVertexData) {
      this.baseVertexData = interleaveBaseStream(this.streams)
    }
    return this.baseVertexData
  }

  // Consecutive index ranges, one per material with a non-zero count
  getMaterialRanges(): MaterialRange[] {
    const ranges: MaterialRange[] = []
    let firstIndex = 0
    for (let materialIndex = 0; materialIndex < this.materials.length; materialIndex++) {
      const count = this.materials[materialIndex].vertexCount | 0
      if (count === 0) continue
      if (firstIndex + count > this.indexData.length) {
        console.warn(
          `[Model] Material "${this.materials[materialIndex].name}" overruns the index buffer, later materials skipped`
        )
        break
      }
      ranges.push({ materialIndex, firstIndex, count })
      firstIndex += count
    }
    if (firstIndex < this.indexData.length) {
      console.warn(`[Model] ${this.indexData.length - firstIndex} indices are not covered by any material`)
    }
    return ranges
  }

  getVertex(index: number): StageVertex {
    const s = this.streams
    return {
      position: Vec3.fromArray(s.positions, index * 3),
      normal: Vec3.fromArray(s.normals, index * 3),
      uv: [s.uvs[index * 2], s.uvs[index * 2 + 1]],
      edgeScale: s.edgeScales[index],
      skin: readVertexSkin(s, index),
    }
  }

  bakeVertexTransforms(bones: Float32Array): Float32Array<ArrayBuffer> {
    return bakeVertexTransforms(this.streams, bones)
  }

  // Same geometry in the baked-transform layout, posed by the given bones
  toBakedLayout(bones: Float32Array): Model {
    const streams: VertexStreams = {
      positions: this.streams.positions,
      normals: this.streams.normals,
      uvs: this.streams.uvs,
      edgeScales: this.streams.edgeScales,
      skinning: { layout: "baked-transform", transforms: this.bakeVertexTransforms(bones) },
    }
    return new Model(streams, this.indexData, this.materials, this.textures, this.boneCount)
  }
}
