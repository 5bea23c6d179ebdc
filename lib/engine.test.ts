import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { Engine } from "./engine"
import { LayoutMismatchError, type VertexStreams } from "./layout"
import { SphereMode, type Material } from "./material"
import { Mat4 } from "./math"
import { Model } from "./model"

interface FakeGpu {
  device: GPUDevice
  calls: string[]
  writes: { label: string; data: ArrayBufferView }[]
  pipelines: GPURenderPipelineDescriptor[]
}

// Records every queue write and pass command in call order
function fakeGpu(): FakeGpu {
  const calls: string[] = []
  const writes: { label: string; data: ArrayBufferView }[] = []
  const pipelines: GPURenderPipelineDescriptor[] = []
  const texture = (label: string) => ({ label, width: 0, height: 0, createView: vi.fn(() => ({})), destroy: vi.fn() })

  const pass = {
    setVertexBuffer: vi.fn(),
    setIndexBuffer: vi.fn(),
    setBindGroup: vi.fn((index: number, group: { label: string }) => {
      calls.push(`setBindGroup ${index} ${group.label}`)
    }),
    setPipeline: vi.fn((pipeline: { label: string }) => {
      calls.push(`setPipeline ${pipeline.label}`)
    }),
    drawIndexed: vi.fn((count: number, instances: number, firstIndex: number) => {
      calls.push(`drawIndexed ${count} ${firstIndex}`)
    }),
    end: vi.fn(() => {
      calls.push("end")
    }),
  }

  const device = {
    createBuffer: vi.fn((descriptor: GPUBufferDescriptor) => ({ label: descriptor.label ?? "", destroy: vi.fn() })),
    createTexture: vi.fn((descriptor: GPUTextureDescriptor) => texture(descriptor.label ?? "")),
    createSampler: vi.fn((descriptor: GPUSamplerDescriptor) => ({ label: descriptor.label ?? "" })),
    createBindGroupLayout: vi.fn(() => ({})),
    createPipelineLayout: vi.fn(() => ({})),
    createBindGroup: vi.fn((descriptor: GPUBindGroupDescriptor) => ({ label: descriptor.label ?? "" })),
    createShaderModule: vi.fn((descriptor: GPUShaderModuleDescriptor) => ({ label: descriptor.label ?? "" })),
    createRenderPipeline: vi.fn((descriptor: GPURenderPipelineDescriptor) => {
      pipelines.push(descriptor)
      return { label: descriptor.label ?? "" }
    }),
    createCommandEncoder: vi.fn(() => {
      calls.push("createCommandEncoder")
      return { beginRenderPass: vi.fn(() => pass), finish: vi.fn(() => ({})) }
    }),
    queue: {
      writeBuffer: vi.fn((buffer: { label: string }, offset: number, data: ArrayBufferView) => {
        calls.push(`writeBuffer ${buffer.label}`)
        writes.push({ label: buffer.label, data })
      }),
      writeTexture: vi.fn(),
      submit: vi.fn(() => {
        calls.push("submit")
      }),
    },
  } as unknown as GPUDevice

  return { device, calls, writes, pipelines }
}

function quadStreams(): VertexStreams {
  return {
    positions: new Float32Array([0, 0, 0, 1, 0, 0, 1, 1, 0, 0, 1, 0]),
    normals: new Float32Array([0, 0, 1, 0, 0, 1, 0, 0, 1, 0, 0, 1]),
    uvs: new Float32Array([0, 0, 1, 0, 1, 1, 0, 1]),
    edgeScales: new Float32Array([1, 1, 1, 1]),
    skinning: {
      layout: "indexed-bone",
      boneIndices: new Uint16Array([0, 0, 0, 0, 1, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0]),
      boneWeights: new Float32Array([1, 0, 0, 0, 1, 0, 0, 0, 1, 0, 0, 0, 0.5, 0.5, 0, 0]),
    },
  }
}

function material(name: string, overrides: Partial<Material> = {}): Material {
  return {
    name,
    diffuse: [1, 1, 1, 1],
    specular: [0, 0, 0],
    ambient: [1, 1, 1],
    shininess: 1,
    diffuseTextureIndex: -1,
    sphereTextureIndex: -1,
    sphereMode: SphereMode.Off,
    toonTextureIndex: -1,
    doubleSided: false,
    edgeEnabled: true,
    edgeColor: [0, 0, 0, 1],
    edgeSize: 1,
    vertexCount: 3,
    ...overrides,
  }
}

function quadModel(): Model {
  return new Model(
    quadStreams(),
    new Uint32Array([0, 1, 2, 0, 2, 3]),
    [material("body"), material("hair", { doubleSided: true, edgeEnabled: false })],
    [],
    2
  )
}

const bones = new Float32Array(32)
bones.set(Mat4.identity().values, 0)
bones.set(Mat4.translation(0, 1, 0).values, 16)

const target = { width: 4, height: 4, createView: () => ({}) } as unknown as GPUTexture

describe("Engine", () => {
  let gpu: FakeGpu

  beforeEach(() => {
    vi.stubGlobal("GPUShaderStage", { VERTEX: 1, FRAGMENT: 2, COMPUTE: 4 })
    vi.stubGlobal("GPUBufferUsage", { COPY_DST: 8, INDEX: 16, VERTEX: 32, UNIFORM: 64, STORAGE: 128 })
    vi.stubGlobal("GPUTextureUsage", { COPY_DST: 2, TEXTURE_BINDING: 4, RENDER_ATTACHMENT: 16 })
    gpu = fakeGpu()
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  function engine(specular: "position" | "normal" = "position"): Engine {
    return new Engine(gpu.device, { colorFormat: "bgra8unorm", sampleCount: 1, specular })
  }

  it("uploads the frame uniforms and bones before encoding", () => {
    const renderer = engine()
    renderer.loadModel(quadModel())
    gpu.calls.length = 0

    renderer.render(target, { layout: "indexed-bone", boneTransforms: bones })

    const encodeAt = gpu.calls.indexOf("createCommandEncoder")
    expect(gpu.calls.slice(0, encodeAt)).toEqual(["writeBuffer frame uniforms", "writeBuffer bone transforms"])
    expect(gpu.calls.slice(encodeAt).some((call) => call.startsWith("writeBuffer"))).toBe(false)
    expect(gpu.calls[gpu.calls.length - 1]).toBe("submit")
  })

  it("binds the frame group once and draws depth, edge, then color", () => {
    const renderer = engine()
    renderer.loadModel(quadModel())
    gpu.calls.length = 0

    renderer.render(target, { layout: "indexed-bone", boneTransforms: bones }, { passes: ["color", "edge", "depth"] })

    expect(gpu.calls.filter((call) => call.startsWith("setBindGroup 0"))).toEqual(["setBindGroup 0 frame bind group"])
    expect(gpu.calls.filter((call) => call.startsWith("setPipeline") || call.startsWith("drawIndexed"))).toEqual([
      "setPipeline depth pipeline (indexed-bone, cull back)",
      "drawIndexed 3 0",
      "setPipeline depth pipeline (indexed-bone, cull none)",
      "drawIndexed 3 3",
      "setPipeline edge pipeline (indexed-bone, cull front)",
      "drawIndexed 3 0",
      "setPipeline color pipeline (indexed-bone, cull back)",
      "drawIndexed 3 0",
      "setPipeline color pipeline (indexed-bone, cull none)",
      "drawIndexed 3 3",
    ])
    expect(gpu.calls.filter((call) => call.startsWith("setBindGroup 1"))).toHaveLength(5)
    expect(renderer.getStats().drawCalls).toBe(5)
  })

  it("sets the specular constant only on color pipelines", () => {
    const renderer = engine("normal")
    renderer.loadModel(quadModel())
    renderer.render(target, { layout: "indexed-bone", boneTransforms: bones }, { passes: ["depth", "edge", "color"] })

    const constants = gpu.pipelines.map((descriptor) => [descriptor.label, descriptor.fragment?.constants])
    expect(constants).toEqual([
      ["depth pipeline (indexed-bone, cull back)", undefined],
      ["depth pipeline (indexed-bone, cull none)", undefined],
      ["edge pipeline (indexed-bone, cull front)", undefined],
      ["color pipeline (indexed-bone, cull back)", { NORMAL_SPECULAR: 1 }],
      ["color pipeline (indexed-bone, cull none)", { NORMAL_SPECULAR: 1 }],
    ])
  })

  it("reuses pipelines across frames", () => {
    const renderer = engine()
    renderer.loadModel(quadModel())
    renderer.render(target, { layout: "indexed-bone", boneTransforms: bones })
    renderer.render(target, { layout: "indexed-bone", boneTransforms: bones })

    expect(gpu.pipelines.map((descriptor) => descriptor.label)).toEqual([
      "edge pipeline (indexed-bone, cull front)",
      "color pipeline (indexed-bone, cull back)",
      "color pipeline (indexed-bone, cull none)",
    ])
    expect(gpu.pipelines[1].fragment?.constants).toEqual({ NORMAL_SPECULAR: 0 })
  })

  it("writes baked per-frame transforms into the vertex transform buffer", () => {
    const renderer = engine()
    renderer.loadModel(quadModel())
    renderer.loadModel(quadModel().toBakedLayout(bones))
    gpu.calls.length = 0
    gpu.writes.length = 0

    const transforms = new Float32Array(4 * 16)
    for (let i = 0; i < 4; i++) transforms.set(Mat4.translation(i, 0, 0).values, i * 16)
    renderer.render(target, { layout: "baked-transform", vertexTransforms: transforms }, { passes: ["color"] })

    expect(gpu.writes.map((write) => write.label)).toEqual(["frame uniforms", "vertex transform buffer"])
    expect(gpu.writes[1].data).toEqual(transforms)
    expect(gpu.writes[1].data).not.toBe(transforms)
    expect(gpu.calls.indexOf("writeBuffer vertex transform buffer")).toBeLessThan(
      gpu.calls.indexOf("createCommandEncoder")
    )
    expect(gpu.calls).toContain("setPipeline color pipeline (baked-transform, cull back)")
  })

  it("keeps the loaded transforms when a baked frame supplies none", () => {
    const renderer = engine()
    renderer.loadModel(quadModel().toBakedLayout(bones))
    gpu.writes.length = 0

    renderer.render(target, { layout: "baked-transform" })

    expect(gpu.writes.map((write) => write.label)).toEqual(["frame uniforms"])
  })

  it("rejects a frame of the other layout before encoding", () => {
    const renderer = engine()
    renderer.loadModel(quadModel().toBakedLayout(bones))
    gpu.calls.length = 0

    expect(() => renderer.render(target, { layout: "indexed-bone", boneTransforms: bones })).toThrow(
      LayoutMismatchError
    )
    expect(gpu.calls).toEqual([])
  })

  it("refuses to render without a model", () => {
    expect(() => engine().render(target, { layout: "indexed-bone", boneTransforms: bones })).toThrow("No model loaded")
  })
})

describe("Engine.requestDevice", () => {
  it("fails without a WebGPU implementation", async () => {
    await expect(Engine.requestDevice()).rejects.toThrow("WebGPU is not supported in this environment.")
  })
})
