import { FieldLabel, FieldType } from "../../schema/field-types.js"
import { buildSchemaFile } from "../../schema/descriptors.js"
import type { SchemaField, SchemaMessage } from "../../schema/model.js"
import { ContractViolation, ResolverError } from "../../util/errors.js"
import { findExtension, findField, findMessage } from "../../__tests__/helpers.js"
import {
  EXTENSION_PATH_STRATEGIES,
  extensionAccessPath,
  jsExtensionImport,
  jsExtensionName,
  outermostScope
} from "../extension-scope.js"

describe("extension-scope", () => {
  const file = buildSchemaFile({
    name: "ext.proto",
    package: "foo",
    message_type: [
      { name: "Target", field: [{ name: "id", number: 1, label: 1, type: 5 }] },
      {
        name: "Outer",
        nested_type: [
          {
            name: "Middle",
            nested_type: [
              {
                name: "Inner",
                extension: [
                  { name: "deep_ext", number: 100, label: 1, type: 5, extendee: ".foo.Target" }
                ]
              }
            ],
            extension: [
              { name: "mid_ext", number: 101, label: 3, type: 9, extendee: ".foo.Target" }
            ]
          }
        ],
        extension: [
          {
            name: "outer_ext",
            number: 102,
            label: 1,
            type: 11,
            type_name: ".foo.Outer",
            extendee: ".foo.Target"
          }
        ]
      }
    ],
    extension: [{ name: "top_ext", number: 103, label: 1, type: 3, extendee: ".foo.Target" }]
  })

  const deep = findExtension(file, "deep_ext")
  const mid = findExtension(file, "mid_ext")
  const outer = findExtension(file, "outer_ext")
  const top = findExtension(file, "top_ext")

  describe("outermostScope", () => {
    it("walks containing types to the top-level message", () => {
      const inner = findMessage(file, "foo.Outer.Middle.Inner")
      expect(outermostScope(inner)).toBe(findMessage(file, "foo.Outer"))
    })
  })

  describe("class-based runtime", () => {
    it("references the immediate declaring scope", () => {
      expect(extensionAccessPath(deep, "class")).toBe(
        "foo.Ext.Outer.Middle.Inner.deepExt.getDescriptor()"
      )
      expect(extensionAccessPath(mid, "class")).toBe("foo.Ext.Outer.Middle.midExt.getDescriptor()")
    })

    it("hangs top-level extensions off the outer class", () => {
      expect(extensionAccessPath(top, "class")).toBe("foo.Ext.topExt.getDescriptor()")
    })
  })

  describe("namespaced-object runtime", () => {
    it("flattens extensions under the outermost scope", () => {
      expect(extensionAccessPath(deep, "namespaced")).toBe("proto.foo.Outer.deepExt")
      expect(extensionAccessPath(mid, "namespaced")).toBe("proto.foo.Outer.midExtList")
      expect(extensionAccessPath(outer, "namespaced")).toBe("proto.foo.Outer.outerExt")
    })

    it("places top-level extensions in the file namespace", () => {
      expect(extensionAccessPath(top, "namespaced")).toBe("proto.foo.topExt")
    })
  })

  describe("holder scope divergence", () => {
    const { class: classRuntime, namespaced } = EXTENSION_PATH_STRATEGIES

    it("differs when the declaring scope is nested", () => {
      expect(classRuntime.holderScope(deep)).toBe(findMessage(file, "foo.Outer.Middle.Inner"))
      expect(namespaced.holderScope(deep)).toBe(findMessage(file, "foo.Outer"))
      expect(classRuntime.holderScope(mid)).not.toBe(namespaced.holderScope(mid))
    })

    it("coincides when the declaring scope is top-level", () => {
      expect(classRuntime.holderScope(outer)).toBe(findMessage(file, "foo.Outer"))
      expect(namespaced.holderScope(outer)).toBe(classRuntime.holderScope(outer))
    })

    it("is absent for file-level extensions", () => {
      expect(classRuntime.holderScope(top)).toBeUndefined()
      expect(namespaced.holderScope(top)).toBeUndefined()
    })
  })

  describe("jsExtensionImport", () => {
    it("imports the outermost scope's namespace object", () => {
      expect(jsExtensionImport(deep)).toBe("proto.foo.Outer")
    })

    it("imports the extension itself at file scope", () => {
      expect(jsExtensionImport(top)).toBe("proto.foo.topExt")
    })
  })

  describe("jsExtensionName", () => {
    it("qualifies by the immediate scope", () => {
      expect(jsExtensionName(deep)).toBe("proto.foo.Outer.Middle.Inner.deepExt")
      expect(jsExtensionName(mid)).toBe("proto.foo.Outer.Middle.midExtList")
      expect(jsExtensionName(top)).toBe("proto.foo.topExt")
    })
  })

  it("resolves file-level extensions without a package", () => {
    const plain = buildSchemaFile({
      name: "plain.proto",
      extension: [{ name: "flag", number: 1, label: 1, type: 8, extendee: ".Target" }]
    })
    const flag = findExtension(plain, "flag")
    expect(extensionAccessPath(flag, "class")).toBe("Plain.flag.getDescriptor()")
    expect(extensionAccessPath(flag, "namespaced")).toBe("proto.flag")
  })

  it("rejects regular fields", () => {
    const id = findField(findMessage(file, "foo.Target"), "id")
    expect(() => extensionAccessPath(id, "namespaced")).toThrow(ResolverError)
    expect(() => jsExtensionName(id)).toThrow('Field "id" is not an extension')
  })

  it("propagates contract violations from an inconsistent scope", () => {
    const stray: SchemaMessage = {
      kind: "message",
      name: "X",
      fullName: "bar.X",
      file,
      fields: [],
      nestedMessages: [],
      nestedEnums: [],
      extensions: [],
      isMapEntry: false
    }
    const ext: SchemaField = {
      name: "e",
      number: 1,
      type: FieldType.Int32,
      label: FieldLabel.Optional,
      hasDefaultValue: false,
      options: {},
      file,
      isExtension: true,
      extensionScope: stray
    }
    expect(() => extensionAccessPath(ext, "namespaced")).toThrow(ContractViolation)
    expect(() => extensionAccessPath(ext, "class")).toThrow(ContractViolation)
  })
})
