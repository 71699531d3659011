import * as protobuf from "protobufjs"
import { log, setLogLevel } from "./util/logger.js"
import { ResolverError } from "./util/errors.js"
import { protoFileToManifestFile } from "./util/names.js"
import { buildSchemaFile } from "./schema/descriptors.js"
import type { FileDescriptorObject } from "./schema/descriptors.js"
import { buildSymbolManifest, hasSymbols, renderManifest } from "./manifest.js"
import { RUNTIME_TARGETS } from "./resolver/index.js"
import type { RuntimeTarget } from "./resolver/index.js"

// ── Protobuf schema for the plugin protocol ───────────────────────────
// Defined programmatically so the plugin is fully self-contained
// (no .proto files needed at runtime).

const pluginRoot = new protobuf.Root()

// google.protobuf.compiler.CodeGeneratorRequest (simplified)
const CodeGeneratorRequest = new protobuf.Type("CodeGeneratorRequest")
  .add(new protobuf.Field("file_to_generate", 1, "string", "repeated"))
  .add(new protobuf.Field("parameter", 2, "string", "optional"))
  .add(
    new protobuf.Field("proto_file", 15, "google.protobuf.FileDescriptorProto", "repeated")
  )

// google.protobuf.compiler.CodeGeneratorResponse
const ResponseFile = new protobuf.Type("File")
  .add(new protobuf.Field("name", 1, "string", "optional"))
  .add(new protobuf.Field("insertion_point", 2, "string", "optional"))
  .add(new protobuf.Field("content", 15, "string", "optional"))

const CodeGeneratorResponse = new protobuf.Type("CodeGeneratorResponse")
  .add(new protobuf.Field("error", 1, "string", "optional"))
  .add(new protobuf.Field("supported_features", 2, "uint64", "optional"))
  .add(new protobuf.Field("file", 15, "File", "repeated"))
  .add(ResponseFile)

// FileDescriptorProto and its nested types
const FieldOptions = new protobuf.Type("FieldOptions")
  .add(new protobuf.Field("jstype", 6, "int32", "optional"))

const FieldDescriptorProto = new protobuf.Type("FieldDescriptorProto")
  .add(new protobuf.Field("name", 1, "string", "optional"))
  .add(new protobuf.Field("extendee", 2, "string", "optional"))
  .add(new protobuf.Field("number", 3, "int32", "optional"))
  .add(new protobuf.Field("label", 4, "int32", "optional"))
  .add(new protobuf.Field("type", 5, "int32", "optional"))
  .add(new protobuf.Field("type_name", 6, "string", "optional"))
  .add(new protobuf.Field("default_value", 7, "string", "optional"))
  .add(new protobuf.Field("options", 8, "FieldOptions", "optional"))
  .add(new protobuf.Field("oneof_index", 9, "int32", "optional"))
  .add(new protobuf.Field("json_name", 10, "string", "optional"))

const EnumDescriptorProto = new protobuf.Type("EnumDescriptorProto")
  .add(new protobuf.Field("name", 1, "string", "optional"))

const MessageOptions = new protobuf.Type("MessageOptions")
  .add(new protobuf.Field("map_entry", 7, "bool", "optional"))

const DescriptorProto = new protobuf.Type("DescriptorProto")
  .add(new protobuf.Field("name", 1, "string", "optional"))
  .add(new protobuf.Field("field", 2, "FieldDescriptorProto", "repeated"))
  .add(new protobuf.Field("nested_type", 3, "DescriptorProto", "repeated"))
  .add(new protobuf.Field("enum_type", 4, "EnumDescriptorProto", "repeated"))
  .add(new protobuf.Field("extension", 6, "FieldDescriptorProto", "repeated"))
  .add(new protobuf.Field("options", 7, "MessageOptions", "optional"))

const FileOptions = new protobuf.Type("FileOptions")
  .add(new protobuf.Field("java_package", 1, "string", "optional"))
  .add(new protobuf.Field("java_outer_classname", 8, "string", "optional"))
  .add(new protobuf.Field("java_multiple_files", 10, "bool", "optional"))

const FileDescriptorProto = new protobuf.Type("FileDescriptorProto")
  .add(new protobuf.Field("name", 1, "string", "optional"))
  .add(new protobuf.Field("package", 2, "string", "optional"))
  .add(new protobuf.Field("dependency", 3, "string", "repeated"))
  .add(new protobuf.Field("message_type", 4, "DescriptorProto", "repeated"))
  .add(new protobuf.Field("enum_type", 5, "EnumDescriptorProto", "repeated"))
  .add(new protobuf.Field("extension", 7, "FieldDescriptorProto", "repeated"))
  .add(new protobuf.Field("options", 8, "FileOptions", "optional"))
  .add(new protobuf.Field("syntax", 12, "string", "optional"))

// Wire types into namespaces
const googlePb = new protobuf.Namespace("google")
const protobufNs = new protobuf.Namespace("protobuf")
const compilerNs = new protobuf.Namespace("compiler")

protobufNs.add(FileDescriptorProto)
protobufNs.add(DescriptorProto)
protobufNs.add(FieldDescriptorProto)
protobufNs.add(EnumDescriptorProto)
protobufNs.add(FileOptions)
protobufNs.add(MessageOptions)
protobufNs.add(FieldOptions)
compilerNs.add(CodeGeneratorRequest)
compilerNs.add(CodeGeneratorResponse)
protobufNs.add(compilerNs)
googlePb.add(protobufNs)
pluginRoot.add(googlePb)

// Resolve all type references
pluginRoot.resolveAll()

export const RequestType = pluginRoot.lookupType("google.protobuf.compiler.CodeGeneratorRequest")
export const ResponseType = pluginRoot.lookupType("google.protobuf.compiler.CodeGeneratorResponse")

/** CodeGeneratorResponse.Feature.FEATURE_PROTO3_OPTIONAL */
const FEATURE_PROTO3_OPTIONAL = 1

// ── Plugin entry ──────────────────────────────────────────────────────

interface CodeGeneratorRequestObject {
  file_to_generate?: string[]
  parameter?: string
  proto_file?: FileDescriptorObject[]
}

export interface PluginOptions {
  logLevel?: string
  targets: RuntimeTarget[]
}

export interface PluginResult {
  files: Array<{ name: string; content: string }>
  error?: string
}

/**
 * Run the protoc plugin: decode request → resolve symbols → encode response.
 */
export function runPlugin(stdin: Uint8Array): Buffer {
  let result: PluginResult

  try {
    result = processRequest(stdin)
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err)
    log.error("Plugin error: %s", message)
    result = { files: [], error: message }
  }

  return encodeResponse(result)
}

/**
 * Decode CodeGeneratorRequest, build the schema model, produce manifests.
 */
function processRequest(stdin: Uint8Array): PluginResult {
  const request: CodeGeneratorRequestObject = RequestType.toObject(RequestType.decode(stdin), {
    arrays: true
  })

  const options = parseOptions(request.parameter ?? "")
  if (options.logLevel) {
    setLogLevel(options.logLevel)
  }

  const filesToGenerate = new Set<string>(request.file_to_generate ?? [])
  const protoFiles = request.proto_file ?? []

  log.info(
    "Processing %d proto file(s), generating for %d",
    protoFiles.length,
    filesToGenerate.size
  )

  const files: Array<{ name: string; content: string }> = []

  for (const protoFile of protoFiles) {
    const fileName = protoFile.name ?? ""
    if (!filesToGenerate.has(fileName)) continue

    log.info("Resolving symbols for %s", fileName)

    const schemaFile = buildSchemaFile(protoFile)
    if (!hasSymbols(schemaFile)) {
      log.info("No declarations in %s, skipping", fileName)
      continue
    }

    const manifest = buildSymbolManifest(schemaFile, { targets: options.targets })
    const manifestName = protoFileToManifestFile(fileName)

    files.push({ name: manifestName, content: renderManifest(manifest) })
    log.info("Generated %s (%d types)", manifestName, manifest.types.length)
  }

  return { files }
}

/**
 * Encode the CodeGeneratorResponse back to protobuf binary.
 */
function encodeResponse(result: PluginResult): Buffer {
  const payload: { supported_features: number; file: PluginResult["files"]; error?: string } = {
    supported_features: FEATURE_PROTO3_OPTIONAL,
    file: result.files.map(f => ({
      name: f.name,
      content: f.content
    }))
  }

  if (result.error) {
    payload.error = result.error
  }

  const msg = ResponseType.create(payload)
  return Buffer.from(ResponseType.encode(msg).finish())
}

/**
 * Parse "key=value,key2=value2" parameter string into plugin options.
 * e.g. "log_level=debug,targets=namespaced"
 */
export function parseOptions(param: string): PluginOptions {
  const params = parseParams(param)
  return {
    logLevel: params.log_level,
    targets: params.targets === undefined ? [...RUNTIME_TARGETS] : parseTargets(params.targets)
  }
}

/**
 * "class+namespaced" → ["class", "namespaced"]
 */
function parseTargets(value: string): RuntimeTarget[] {
  const targets: RuntimeTarget[] = []
  for (const part of value.split("+")) {
    const name = part.trim()
    const target = RUNTIME_TARGETS.find(t => t === name)
    if (!target) {
      throw new ResolverError(
        `Unknown target "${name}" (expected one of: ${RUNTIME_TARGETS.join(", ")})`
      )
    }
    if (!targets.includes(target)) targets.push(target)
  }
  return targets
}

function parseParams(param: string): Record<string, string | undefined> {
  const result: Record<string, string | undefined> = {}
  if (!param) return result

  for (const pair of param.split(",")) {
    const eq = pair.indexOf("=")
    if (eq > 0) {
      result[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim()
    }
  }
  return result
}
