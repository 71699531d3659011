import type { SchemaField, SchemaFile, SchemaMessage } from "../schema/model.js"

/**
 * Depth-first lookup of a message by full name.
 */
export function findMessage(file: SchemaFile, fullName: string): SchemaMessage {
  const stack = [...file.messages]
  for (let msg = stack.pop(); msg; msg = stack.pop()) {
    if (msg.fullName === fullName) return msg
    stack.push(...msg.nestedMessages)
  }
  throw new Error(`No message ${fullName} in ${file.name}`)
}

export function findField(message: SchemaMessage, name: string): SchemaField {
  const field = message.fields.find(f => f.name === name)
  if (!field) throw new Error(`No field ${name} in ${message.fullName}`)
  return field
}

/**
 * Lookup of an extension declared anywhere in the file.
 */
export function findExtension(file: SchemaFile, name: string): SchemaField {
  const stack = [...file.messages]
  const candidates = [...file.extensions]
  for (let msg = stack.pop(); msg; msg = stack.pop()) {
    candidates.push(...msg.extensions)
    stack.push(...msg.nestedMessages)
  }
  const ext = candidates.find(f => f.name === name)
  if (!ext) throw new Error(`No extension ${name} in ${file.name}`)
  return ext
}
