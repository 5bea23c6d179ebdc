import { Environment } from "./environment"
import { planFrame, takeSnapshot, type FrameOptions, type FrameSkinning, type FrameSnapshot } from "./frame"
import { vertexBufferLayouts, type StageKind, type VertexLayout } from "./layout"
import { SphereMode, toSphereMode, writeMaterialUniforms } from "./material"
import type { MaterialRange, Model } from "./model"
import { buildShaderSource, NORMAL_SPECULAR_CONSTANT } from "./shaders"
import { TextureCache, TextureUnit } from "./textures"
import { FRAME_UNIFORMS, MATERIAL_UNIFORMS, UniformBlock } from "./uniforms"

export type SpecularTerm = "position" | "normal"

export type EngineOptions = {
  colorFormat?: GPUTextureFormat
  depthFormat?: GPUTextureFormat
  sampleCount?: number
  clearColor?: GPUColorDict
  specular?: SpecularTerm // "position" reproduces the legacy asset shading
  textureFilter?: GPUFilterMode
}

export interface EngineStats {
  frameTime: number // ms, averaged over the last 60 frames
  vertices: number
  drawCalls: number
}

interface MaterialBinding {
  bindGroup: GPUBindGroup
  uniformBuffer: GPUBuffer
}

/**
 * Draws one skinned model per frame in up to three passes (depth, edge,
 * color). All passes of a frame share one frame bind group and one set of
 * vertex buffers, written once before the first draw is encoded.
 */
export class Engine {
  private device: GPUDevice
  readonly environment = new Environment()
  private colorFormat: GPUTextureFormat
  private depthFormat: GPUTextureFormat
  private sampleCount: number
  private clearColor: GPUColorDict
  private specular: SpecularTerm
  private frameBindGroupLayout: GPUBindGroupLayout
  private materialBindGroupLayout: GPUBindGroupLayout
  private pipelineLayout: GPUPipelineLayout
  private frameUniformBuffer: GPUBuffer
  private textures: TextureCache
  private pipelines = new Map<string, GPURenderPipeline>()
  private shaderModules = new Map<string, GPUShaderModule>()
  // Per-model resources
  private currentModel: Model | null = null
  private baseVertexBuffer: GPUBuffer | null = null
  private skinBuffers: GPUBuffer[] = []
  private indexBuffer: GPUBuffer | null = null
  private boneBuffer: GPUBuffer | null = null
  private frameBindGroup: GPUBindGroup | null = null
  private materialBindings: MaterialBinding[] = []
  private ranges: MaterialRange[] = []
  // Render targets, recreated when the output size changes
  private depthTexture: GPUTexture | null = null
  private multisampleTexture: GPUTexture | null = null

  private frameTimeSamples: number[] = []
  private frameTimeSum: number = 0
  private stats: EngineStats = {
    frameTime: 0,
    vertices: 0,
    drawCalls: 0,
  }

  constructor(device: GPUDevice, options?: EngineOptions) {
    this.device = device
    this.colorFormat = options?.colorFormat ?? Engine.preferredFormat()
    this.depthFormat = options?.depthFormat ?? "depth24plus"
    this.sampleCount = options?.sampleCount ?? 4
    this.clearColor = options?.clearColor ?? { r: 0, g: 0, b: 0, a: 0 }
    this.specular = options?.specular ?? "position"
    this.textures = new TextureCache(device, options?.textureFilter ?? "linear")

    this.frameBindGroupLayout = device.createBindGroupLayout({
      label: "frame bind group layout",
      entries: [
        { binding: 0, visibility: GPUShaderStage.VERTEX | GPUShaderStage.FRAGMENT, buffer: { type: "uniform" } }, // frame
        { binding: 1, visibility: GPUShaderStage.VERTEX, buffer: { type: "read-only-storage" } }, // uBoneTransform
      ],
    })

    this.materialBindGroupLayout = device.createBindGroupLayout({
      label: "material bind group layout",
      entries: [
        { binding: 0, visibility: GPUShaderStage.VERTEX | GPUShaderStage.FRAGMENT, buffer: { type: "uniform" } }, // material
        { binding: 1, visibility: GPUShaderStage.FRAGMENT, texture: {} }, // uTexture
        { binding: 2, visibility: GPUShaderStage.FRAGMENT, texture: {} }, // uSphereTexture
        { binding: 3, visibility: GPUShaderStage.FRAGMENT, texture: {} }, // uToonTexture
        { binding: 4, visibility: GPUShaderStage.FRAGMENT, sampler: {} }, // repeat
        { binding: 5, visibility: GPUShaderStage.FRAGMENT, sampler: {} }, // clamp
      ],
    })

    this.pipelineLayout = device.createPipelineLayout({
      label: "model pipeline layout",
      bindGroupLayouts: [this.frameBindGroupLayout, this.materialBindGroupLayout],
    })

    this.frameUniformBuffer = device.createBuffer({
      label: "frame uniforms",
      size: FRAME_UNIFORMS.byteSize,
      usage: GPUBufferUsage.UNIFORM | GPUBufferUsage.COPY_DST,
    })
  }

  static async requestDevice(gpu?: GPU): Promise<GPUDevice> {
    const source = gpu ?? (typeof navigator === "undefined" ? undefined : navigator.gpu)
    const adapter = await source?.requestAdapter()
    const device = await adapter?.requestDevice()
    if (!device) {
      throw new Error("WebGPU is not supported in this environment.")
    }
    return device
  }

  private static preferredFormat(): GPUTextureFormat {
    if (typeof navigator !== "undefined" && navigator.gpu) {
      return navigator.gpu.getPreferredCanvasFormat()
    }
    return "bgra8unorm"
  }

  public loadModel(model: Model) {
    this.releaseModel()
    this.currentModel = model
    this.createVertexBuffers(model)
    this.createBoneBuffer(model)
    this.createMaterialBindings(model)
    this.ranges = model.getMaterialRanges()
    this.stats.vertices = model.getVertexCount()
  }

  private createVertexBuffers(model: Model) {
    const vertices = model.getBaseVertices()
    this.baseVertexBuffer = this.device.createBuffer({
      label: "model vertex buffer",
      size: vertices.byteLength,
      usage: GPUBufferUsage.VERTEX | GPUBufferUsage.COPY_DST,
    })
    this.device.queue.writeBuffer(this.baseVertexBuffer, 0, vertices)

    const skinning = model.getStreams().skinning
    const streams: { label: string; data: Uint16Array<ArrayBuffer> | Float32Array<ArrayBuffer> }[] =
      skinning.layout === "indexed-bone"
        ? [
            { label: "bone index buffer", data: new Uint16Array(skinning.boneIndices) },
            { label: "bone weight buffer", data: new Float32Array(skinning.boneWeights) },
          ]
        : [{ label: "vertex transform buffer", data: new Float32Array(skinning.transforms) }]

    this.skinBuffers = streams.map(({ label, data }) => {
      const buffer = this.device.createBuffer({
        label,
        size: data.byteLength,
        usage: GPUBufferUsage.VERTEX | GPUBufferUsage.COPY_DST,
      })
      this.device.queue.writeBuffer(buffer, 0, data)
      return buffer
    })

    const indices = model.getIndices()
    if (indices.length === 0) {
      throw new Error("Model has no indices")
    }
    this.indexBuffer = this.device.createBuffer({
      label: "model index buffer",
      size: indices.byteLength,
      usage: GPUBufferUsage.INDEX | GPUBufferUsage.COPY_DST,
    })
    this.device.queue.writeBuffer(this.indexBuffer, 0, indices)
  }

  // Sized to the model's bone count; the baked layout still binds a minimal buffer
  private createBoneBuffer(model: Model) {
    const boneBytes = model.getLayout() === "indexed-bone" ? model.getBoneCount() * 16 * 4 : 0
    this.boneBuffer = this.device.createBuffer({
      label: "bone transforms",
      size: Math.max(256, boneBytes),
      usage: GPUBufferUsage.STORAGE | GPUBufferUsage.COPY_DST,
    })

    this.frameBindGroup = this.device.createBindGroup({
      label: "frame bind group",
      layout: this.frameBindGroupLayout,
      entries: [
        { binding: 0, resource: { buffer: this.frameUniformBuffer } },
        { binding: 1, resource: { buffer: this.boneBuffer } },
      ],
    })
  }

  private createMaterialBindings(model: Model) {
    const materials = model.getMaterials()
    if (materials.length === 0) {
      throw new Error("Model has no materials")
    }

    this.materialBindings = materials.map((mat) => {
      const diffuse = model.getTexture(mat.diffuseTextureIndex)
      const sphere = model.getTexture(mat.sphereTextureIndex)
      const toon = model.getTexture(mat.toonTextureIndex)

      const sphereMode = toSphereMode(mat.sphereMode)
      if (sphereMode !== SphereMode.Off && !sphere) {
        console.warn(`[Engine] Material "${mat.name}" has sphere mode ${sphereMode} but no sphere texture`)
      }

      const uniforms = new UniformBlock(MATERIAL_UNIFORMS)
      writeMaterialUniforms(uniforms, mat, { hasSphereTexture: sphere !== null, hasToonTexture: toon !== null })
      const uniformBuffer = this.device.createBuffer({
        label: `material uniform: ${mat.name}`,
        size: MATERIAL_UNIFORMS.byteSize,
        usage: GPUBufferUsage.UNIFORM | GPUBufferUsage.COPY_DST,
      })
      this.device.queue.writeBuffer(uniformBuffer, 0, uniforms.data)

      const white = this.textures.white()
      const bindGroup = this.device.createBindGroup({
        label: `material bind group: ${mat.name}`,
        layout: this.materialBindGroupLayout,
        entries: [
          { binding: 0, resource: { buffer: uniformBuffer } },
          { binding: 1, resource: (diffuse ? this.textures.get(diffuse, TextureUnit.Base) : white).createView() },
          { binding: 2, resource: (sphere ? this.textures.get(sphere, TextureUnit.Sphere) : white).createView() },
          { binding: 3, resource: (toon ? this.textures.get(toon, TextureUnit.Toon) : white).createView() },
          { binding: 4, resource: this.textures.repeatSampler },
          { binding: 5, resource: this.textures.clampSampler },
        ],
      })

      return { bindGroup, uniformBuffer }
    })
  }

  private getShaderModule(stage: StageKind, layout: VertexLayout): GPUShaderModule {
    const key = `${layout}:${stage}`
    let module = this.shaderModules.get(key)
    if (!module) {
      module = this.device.createShaderModule({
        label: `${stage} shader (${layout})`,
        code: buildShaderSource(stage, layout),
      })
      this.shaderModules.set(key, module)
    }
    return module
  }

  private getPipeline(stage: StageKind, cullMode: GPUCullMode, layout: VertexLayout): GPURenderPipeline {
    const key = `${layout}:${stage}:${cullMode}`
    const cached = this.pipelines.get(key)
    if (cached) return cached

    const module = this.getShaderModule(stage, layout)
    const blend: GPUBlendState | undefined =
      stage === "depth"
        ? undefined
        : {
            color: { srcFactor: "src-alpha", dstFactor: "one-minus-src-alpha", operation: "add" },
            alpha: { srcFactor: "src-alpha", dstFactor: "dst-alpha", operation: "add" },
          }

    const pipeline = this.device.createRenderPipeline({
      label: `${stage} pipeline (${layout}, cull ${cullMode})`,
      layout: this.pipelineLayout,
      vertex: {
        module,
        entryPoint: "vs",
        buffers: vertexBufferLayouts(layout, stage),
      },
      fragment: {
        module,
        entryPoint: "fs",
        targets: [{ format: this.colorFormat, blend }],
        constants: stage === "color" ? { [NORMAL_SPECULAR_CONSTANT]: this.specular === "normal" ? 1 : 0 } : undefined,
      },
      primitive: { topology: "triangle-list", frontFace: "ccw", cullMode },
      depthStencil: {
        format: this.depthFormat,
        depthWriteEnabled: true,
        depthCompare: "less-equal",
      },
      multisample: {
        count: this.sampleCount,
      },
    })
    this.pipelines.set(key, pipeline)
    return pipeline
  }

  private ensureRenderTargets(target: GPUTexture): GPUTexture {
    if (this.depthTexture && this.depthTexture.width === target.width && this.depthTexture.height === target.height) {
      return this.depthTexture
    }
    this.depthTexture?.destroy()
    this.multisampleTexture?.destroy()

    const depthTexture = this.device.createTexture({
      label: "depth texture",
      size: [target.width, target.height],
      sampleCount: this.sampleCount,
      format: this.depthFormat,
      usage: GPUTextureUsage.RENDER_ATTACHMENT,
    })
    this.depthTexture = depthTexture
    this.multisampleTexture =
      this.sampleCount > 1
        ? this.device.createTexture({
            label: "multisample render target",
            size: [target.width, target.height],
            sampleCount: this.sampleCount,
            format: this.colorFormat,
            usage: GPUTextureUsage.RENDER_ATTACHMENT,
          })
        : null
    return depthTexture
  }

  /**
   * Renders one frame into target. The frame's bones and camera are copied
   * into a snapshot and uploaded before any draw is encoded; a layout mismatch
   * throws before anything is submitted.
   */
  public render(target: GPUTexture, skinning: FrameSkinning, options?: FrameOptions): FrameSnapshot {
    const model = this.currentModel
    const frameBindGroup = this.frameBindGroup
    const baseVertexBuffer = this.baseVertexBuffer
    const indexBuffer = this.indexBuffer
    const boneBuffer = this.boneBuffer
    if (!model || !frameBindGroup || !baseVertexBuffer || !indexBuffer || !boneBuffer) {
      throw new Error("No model loaded")
    }
    const layout = model.getLayout()

    const start = performance.now()
    const snapshot = takeSnapshot(
      this.environment,
      skinning,
      { layout, boneCount: model.getBoneCount(), vertexCount: model.getVertexCount() },
      options
    )

    // Every write for this frame happens before encoding
    this.device.queue.writeBuffer(this.frameUniformBuffer, 0, snapshot.frameUniforms.data)
    if (snapshot.boneTransforms) {
      this.device.queue.writeBuffer(boneBuffer, 0, snapshot.boneTransforms)
    }
    if (snapshot.vertexTransforms) {
      this.device.queue.writeBuffer(this.skinBuffers[0], 0, snapshot.vertexTransforms)
    }

    const depthTexture = this.ensureRenderTargets(target)
    const targetView = target.createView()
    const colorAttachment: GPURenderPassColorAttachment = this.multisampleTexture
      ? {
          view: this.multisampleTexture.createView(),
          resolveTarget: targetView,
          clearValue: this.clearColor,
          loadOp: "clear",
          storeOp: "store",
        }
      : {
          view: targetView,
          clearValue: this.clearColor,
          loadOp: "clear",
          storeOp: "store",
        }

    const encoder = this.device.createCommandEncoder({ label: "frame encoder" })
    const pass = encoder.beginRenderPass({
      label: "model pass",
      colorAttachments: [colorAttachment],
      depthStencilAttachment: {
        view: depthTexture.createView(),
        depthClearValue: 1.0,
        depthLoadOp: "clear",
        depthStoreOp: "store",
      },
    })

    pass.setVertexBuffer(0, baseVertexBuffer)
    this.skinBuffers.forEach((buffer, i) => pass.setVertexBuffer(i + 1, buffer))
    pass.setIndexBuffer(indexBuffer, "uint32")
    pass.setBindGroup(0, frameBindGroup)

    const draws = planFrame(snapshot.passes, this.ranges, model.getMaterials())
    let boundPipeline: GPURenderPipeline | null = null
    for (const draw of draws) {
      const pipeline = this.getPipeline(draw.stage, draw.cullMode, layout)
      if (pipeline !== boundPipeline) {
        pass.setPipeline(pipeline)
        boundPipeline = pipeline
      }
      pass.setBindGroup(1, this.materialBindings[draw.materialIndex].bindGroup)
      pass.drawIndexed(draw.count, 1, draw.firstIndex, 0, 0)
    }

    pass.end()
    this.device.queue.submit([encoder.finish()])

    this.stats.drawCalls = draws.length
    this.updateStats(performance.now() - start)
    return snapshot
  }

  private updateStats(frameTime: number) {
    const maxSamples = 60
    this.frameTimeSamples.push(frameTime)
    this.frameTimeSum += frameTime
    const removed = this.frameTimeSamples.length > maxSamples ? this.frameTimeSamples.shift() : undefined
    if (removed !== undefined) {
      this.frameTimeSum -= removed
    }
    const avgFrameTime = this.frameTimeSum / this.frameTimeSamples.length
    this.stats.frameTime = Math.round(avgFrameTime * 100) / 100
  }

  public getStats(): EngineStats {
    return { ...this.stats }
  }

  private releaseModel() {
    this.baseVertexBuffer?.destroy()
    this.skinBuffers.forEach((buffer) => buffer.destroy())
    this.indexBuffer?.destroy()
    this.boneBuffer?.destroy()
    this.materialBindings.forEach((binding) => binding.uniformBuffer.destroy())
    this.baseVertexBuffer = null
    this.skinBuffers = []
    this.indexBuffer = null
    this.boneBuffer = null
    this.frameBindGroup = null
    this.materialBindings = []
    this.ranges = []
    this.currentModel = null
  }

  public dispose() {
    this.releaseModel()
    this.textures.dispose()
    this.depthTexture?.destroy()
    this.multisampleTexture?.destroy()
    this.depthTexture = null
    this.multisampleTexture = null
    this.frameUniformBuffer.destroy()
    this.pipelines.clear()
    this.shaderModules.clear()
  }
}
