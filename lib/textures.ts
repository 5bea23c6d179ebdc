import type { Texture } from "./material"

export enum TextureUnit {
  Base = 0,
  Sphere = 1,
  Toon = 2,
}

export function textureCacheKey(path: string, unit: TextureUnit): string {
  return `${unit}:${path}`
}

export interface MipLevel {
  width: number
  height: number
  data: Uint8Array<ArrayBuffer>
}

/**
 * Full RGBA8 mip chain down to 1x1, level 0 first. Each level is a 2x2 box
 * filter of the one above. An odd trailing row or column is dropped, and a
 * side already at 1 reads its single row or column twice.
 */
export function buildMipChain(texture: Texture): MipLevel[] {
  let level: MipLevel = { width: texture.width, height: texture.height, data: new Uint8Array(texture.data) }
  const levels = [level]
  while (level.width > 1 || level.height > 1) {
    const src = level
    const width = Math.max(1, src.width >> 1)
    const height = Math.max(1, src.height >> 1)
    const data = new Uint8Array(width * height * 4)
    for (let y = 0; y < height; y++) {
      const y0 = Math.min(y * 2, src.height - 1)
      const y1 = Math.min(y * 2 + 1, src.height - 1)
      for (let x = 0; x < width; x++) {
        const x0 = Math.min(x * 2, src.width - 1)
        const x1 = Math.min(x * 2 + 1, src.width - 1)
        for (let c = 0; c < 4; c++) {
          const sum =
            src.data[(y0 * src.width + x0) * 4 + c] +
            src.data[(y0 * src.width + x1) * 4 + c] +
            src.data[(y1 * src.width + x0) * 4 + c] +
            src.data[(y1 * src.width + x1) * 4 + c]
          data[(y * width + x) * 4 + c] = Math.round(sum / 4)
        }
      }
    }
    level = { width, height, data }
    levels.push(level)
  }
  return levels
}

/**
 * GPU textures shared between materials, keyed by (path, unit).
 * Toon ramps are sampled with clamp-to-edge, everything else repeats.
 */
export class TextureCache {
  private device: GPUDevice
  private cache = new Map<string, GPUTexture>()
  private whiteTexture: GPUTexture | null = null
  readonly repeatSampler: GPUSampler
  readonly clampSampler: GPUSampler

  constructor(device: GPUDevice, filter: GPUFilterMode = "linear") {
    this.device = device
    this.repeatSampler = device.createSampler({
      label: "repeat sampler",
      magFilter: filter,
      minFilter: filter,
      mipmapFilter: filter,
      addressModeU: "repeat",
      addressModeV: "repeat",
    })
    this.clampSampler = device.createSampler({
      label: "toon sampler",
      magFilter: filter,
      minFilter: filter,
      mipmapFilter: filter,
      addressModeU: "clamp-to-edge",
      addressModeV: "clamp-to-edge",
    })
  }

  get(texture: Texture, unit: TextureUnit): GPUTexture {
    const key = textureCacheKey(texture.path, unit)
    const cached = this.cache.get(key)
    if (cached) {
      return cached
    }

    if (texture.data.byteLength !== texture.width * texture.height * 4) {
      throw new Error(
        `Texture "${texture.path}" has ${texture.data.byteLength} bytes, expected ${texture.width * texture.height * 4}`
      )
    }

    const levels = buildMipChain(texture)
    const gpuTexture = this.device.createTexture({
      label: `texture: ${texture.path}`,
      size: [texture.width, texture.height],
      mipLevelCount: levels.length,
      format: "rgba8unorm",
      usage: GPUTextureUsage.TEXTURE_BINDING | GPUTextureUsage.COPY_DST,
    })
    levels.forEach((level, mipLevel) => {
      this.device.queue.writeTexture(
        { texture: gpuTexture, mipLevel },
        level.data,
        { bytesPerRow: level.width * 4 },
        [level.width, level.height]
      )
    })

    this.cache.set(key, gpuTexture)
    return gpuTexture
  }

  // 1x1 white, bound where a material has no texture for a slot
  white(): GPUTexture {
    if (!this.whiteTexture) {
      this.whiteTexture = this.device.createTexture({
        label: "white texture",
        size: [1, 1],
        format: "rgba8unorm",
        usage: GPUTextureUsage.TEXTURE_BINDING | GPUTextureUsage.COPY_DST,
      })
      this.device.queue.writeTexture(
        { texture: this.whiteTexture },
        new Uint8Array([255, 255, 255, 255]),
        { bytesPerRow: 4 },
        [1, 1]
      )
    }
    return this.whiteTexture
  }

  dispose() {
    for (const texture of this.cache.values()) texture.destroy()
    this.cache.clear()
    this.whiteTexture?.destroy()
    this.whiteTexture = null
  }
}
