// ═══════════════════════════════════════════════════════════════════════════
// Scene Documents
// XML-shaped, JSON-safe tree exchanged with the persistence collaborator.
// Each element maps 1:1 onto an XML element: tag, attributes, children, text.
// ═══════════════════════════════════════════════════════════════════════════

import { MalformedDocumentError } from '../errors'

export interface DocumentElement {
  tag: string
  attributes: Record<string, string>
  children: DocumentElement[]
  text?: string
}

// ─────────────────────────────────────────────────────────────────────────────
// Construction
// ─────────────────────────────────────────────────────────────────────────────

export function element(
  tag: string,
  attributes: Record<string, string> = {},
  children: DocumentElement[] = [],
  text?: string
): DocumentElement {
  const el: DocumentElement = { tag, attributes, children }
  if (text !== undefined) el.text = text
  return el
}

export function textElement(tag: string, text: string): DocumentElement {
  return element(tag, {}, [], text)
}

// ─────────────────────────────────────────────────────────────────────────────
// Queries
// ─────────────────────────────────────────────────────────────────────────────

export function findChild(parent: DocumentElement, tag: string): DocumentElement | undefined {
  return parent.children.find(c => c.tag === tag)
}

export function findChildren(parent: DocumentElement, tag: string): DocumentElement[] {
  return parent.children.filter(c => c.tag === tag)
}

export function requireChild(parent: DocumentElement, tag: string): DocumentElement {
  const child = findChild(parent, tag)
  if (!child) {
    throw new MalformedDocumentError(`${parent.tag} element has no ${tag} subelement`)
  }
  return child
}

export function requireAttribute(el: DocumentElement, name: string): string {
  const value = el.attributes[name]
  if (value === undefined) {
    throw new MalformedDocumentError(`${el.tag} element must specify the '${name}' attribute`)
  }
  return value
}

export function requireChildText(parent: DocumentElement, tag: string): string {
  const child = requireChild(parent, tag)
  if (child.text === undefined) {
    throw new MalformedDocumentError(`${tag} element of ${parent.tag} has no text`)
  }
  return child.text
}

export function requireNumber(el: DocumentElement, name: string): number {
  const raw = requireAttribute(el, name)
  const value = Number(raw)
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new MalformedDocumentError(`${el.tag} attribute '${name}' must be numeric, got '${raw}'`)
  }
  return value
}

// ─────────────────────────────────────────────────────────────────────────────
// Booleans
// ─────────────────────────────────────────────────────────────────────────────

export function boolToText(value: boolean): string {
  return value ? 'true' : 'false'
}

export function textToBool(text: string): boolean {
  const normalized = text.trim().toLowerCase()
  if (normalized === 'true') return true
  if (normalized === 'false') return false
  throw new MalformedDocumentError(`Expected 'true' or 'false', got '${text}'`)
}

// ─────────────────────────────────────────────────────────────────────────────
// JSON Helpers
// ─────────────────────────────────────────────────────────────────────────────

export function documentToJSON(doc: DocumentElement, pretty = false): string {
  return pretty ? JSON.stringify(doc, null, 2) : JSON.stringify(doc)
}

export function documentFromJSON(json: string): DocumentElement {
  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch (e) {
    throw new MalformedDocumentError(`Document is not valid JSON: ${e instanceof Error ? e.message : String(e)}`)
  }
  return toElement(parsed, 'document')
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toElement(value: unknown, path: string): DocumentElement {
  if (!isRecord(value) || typeof value.tag !== 'string') {
    throw new MalformedDocumentError(`${path}: expected an element with a string tag`)
  }
  const tag = value.tag
  const here = `${path}/${tag}`

  const attributes: Record<string, string> = {}
  if (value.attributes !== undefined) {
    if (!isRecord(value.attributes)) {
      throw new MalformedDocumentError(`${here}: attributes must be an object`)
    }
    for (const [key, attr] of Object.entries(value.attributes)) {
      if (typeof attr !== 'string') {
        throw new MalformedDocumentError(`${here}: attribute '${key}' must be a string`)
      }
      attributes[key] = attr
    }
  }

  const rawChildren = value.children ?? []
  if (!Array.isArray(rawChildren)) {
    throw new MalformedDocumentError(`${here}: children must be an array`)
  }

  let text: string | undefined
  if (typeof value.text === 'string') {
    text = value.text
  } else if (value.text !== undefined) {
    throw new MalformedDocumentError(`${here}: text must be a string`)
  }

  const children = rawChildren.map((child: unknown) => toElement(child, here))
  return element(tag, attributes, children, text)
}
