import { buildSchemaFile } from "../../schema/descriptors.js"
import type { SchemaEnum } from "../../schema/model.js"
import { ContractViolation } from "../../util/errors.js"
import { findField, findMessage } from "../../__tests__/helpers.js"
import {
  computeFieldAccessorName,
  packageRelativeName,
  qualifiedName,
  runtimeNamespace
} from "../namespace.js"

describe("namespace", () => {
  const file = buildSchemaFile({
    name: "foo/bar/x.proto",
    package: "foo.bar",
    syntax: "proto3",
    message_type: [
      {
        name: "Outer",
        nested_type: [{ name: "Inner" }],
        enum_type: [{ name: "Kind" }],
        field: [
          { name: "user_id", number: 1, label: 3, type: 5 },
          { name: "user_id_single", number: 2, label: 1, type: 5 },
          { name: "user_ID", number: 3, label: 3, type: 5 }
        ]
      }
    ],
    enum_type: [{ name: "Bar" }]
  })

  const unpackaged = buildSchemaFile({
    name: "color.proto",
    enum_type: [{ name: "Color" }],
    message_type: [{ name: "Box", nested_type: [{ name: "Lid" }] }]
  })

  describe("runtimeNamespace", () => {
    it("prefixes the package with the runtime root", () => {
      expect(runtimeNamespace(file)).toBe("proto.foo.bar")
    })

    it("falls back to the bare root without a package", () => {
      expect(runtimeNamespace(unpackaged)).toBe("proto")
    })
  })

  describe("qualifiedName", () => {
    it("re-roots nested messages under the runtime namespace", () => {
      expect(qualifiedName(findMessage(file, "foo.bar.Outer.Inner"))).toBe(
        "proto.foo.bar.Outer.Inner"
      )
      expect(qualifiedName(findMessage(file, "foo.bar.Outer"))).toBe("proto.foo.bar.Outer")
    })

    it("qualifies nested and top-level enums", () => {
      const outer = findMessage(file, "foo.bar.Outer")
      expect(qualifiedName(outer.nestedEnums[0])).toBe("proto.foo.bar.Outer.Kind")
      expect(qualifiedName(file.enums[0])).toBe("proto.foo.bar.Bar")
    })

    it("inserts a separator when the file has no package", () => {
      expect(qualifiedName(unpackaged.enums[0])).toBe("proto.Color")
      expect(qualifiedName(findMessage(unpackaged, "Box.Lid"))).toBe("proto.Box.Lid")
    })

    it("starts with the runtime namespace and never repeats the package", () => {
      const inner = findMessage(file, "foo.bar.Outer.Inner")
      const name = qualifiedName(inner)
      expect(name.startsWith(runtimeNamespace(file))).toBe(true)
      expect(name.split("foo.bar").length - 1).toBe(1)
    })

    it("throws a contract violation when the name is outside the package", () => {
      const stray: SchemaEnum = { kind: "enum", name: "Thing", fullName: "other.Thing", file }
      expect(() => qualifiedName(stray)).toThrow(ContractViolation)
      expect(() => qualifiedName(stray)).toThrow('Expected "other.Thing" to start with "foo.bar."')
    })

    it("rejects a package match that is not followed by a separator", () => {
      const stray: SchemaEnum = { kind: "enum", name: "X", fullName: "foo.barbaz.X", file }
      expect(() => packageRelativeName(stray)).toThrow(ContractViolation)
    })

    it("reports the offending element and expected prefix", () => {
      const stray: SchemaEnum = { kind: "enum", name: "Thing", fullName: "other.Thing", file }
      try {
        qualifiedName(stray)
        throw new Error("expected a contract violation")
      } catch (err) {
        expect(err).toBeInstanceOf(ContractViolation)
        if (err instanceof ContractViolation) {
          expect(err.element).toBe("other.Thing")
          expect(err.expectedPrefix).toBe("foo.bar.")
        }
      }
    })
  })

  describe("computeFieldAccessorName", () => {
    const outer = findMessage(file, "foo.bar.Outer")

    it("appends List to repeated fields", () => {
      expect(computeFieldAccessorName(findField(outer, "user_id"))).toBe("userIdList")
    })

    it("normalizes mixed-case segments before suffixing", () => {
      expect(computeFieldAccessorName(findField(outer, "user_ID"))).toBe("userIdList")
    })

    it("leaves singular fields unsuffixed", () => {
      expect(computeFieldAccessorName(findField(outer, "user_id_single"))).toBe("userIdSingle")
    })
  })
})
