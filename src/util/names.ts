/**
 * Convert a lower_underscore identifier to lowerCamel.
 * e.g. "user_id" → "userId", "" → ""
 *
 * The first segment is lowercased; every later segment gets its first
 * letter capitalised and the rest lowercased.
 * e.g. "user_NAME" → "userName"
 */
export function toLowerCamel(identifier: string): string {
  const [head, ...rest] = identifier.split("_")
  return (
    head.toLowerCase() +
    rest.map(s => s.charAt(0).toUpperCase() + s.slice(1).toLowerCase()).join("")
  )
}

/**
 * protoc's underscore-to-camel rule, used for class-based runtime names.
 * Non-alphanumeric characters are dropped and capitalise the next letter,
 * and so does a digit.
 * e.g. ("foo_bar2baz", false) → "fooBar2Baz", ("my_file", true) → "MyFile"
 */
export function underscoresToCamelCase(input: string, capitalizeFirst: boolean): string {
  let result = ""
  let capNext = capitalizeFirst

  for (let i = 0; i < input.length; i++) {
    const c = input.charAt(i)
    if (c >= "a" && c <= "z") {
      result += capNext ? c.toUpperCase() : c
      capNext = false
    } else if (c >= "A" && c <= "Z") {
      result += i === 0 && !capitalizeFirst ? c.toLowerCase() : c
      capNext = false
    } else if (c >= "0" && c <= "9") {
      result += c
      capNext = true
    } else {
      capNext = true
    }
  }
  return result
}

/**
 * Base name of a .proto path, without directory or extension.
 * e.g. "foo/bar/my_file.proto" → "my_file"
 */
export function protoBaseName(protoFile: string): string {
  const parts = protoFile.split("/")
  return parts[parts.length - 1].replace(/\.proto(devel)?$/, "")
}

/**
 * Generate the manifest filename for a given .proto file, rooted under
 * the same directory protoc reported.
 * e.g. "foo/bar/my_file.proto" → "foo/bar/my_file.symbols.json"
 */
export function protoFileToManifestFile(protoFile: string): string {
  return `${protoFile.replace(/\.proto(devel)?$/, "")}.symbols.json`
}
