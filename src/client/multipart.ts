/**
 * Minimal multipart/mixed decoding, used for ICV violation reports
 */

export interface MultipartPart {
  headers: Record<string, string>
  body: string
}

/**
 * Extract the boundary parameter from a multipart Content-Type header
 */
export function boundaryOf(contentType: string | null): string | undefined {
  if (!contentType || !contentType.toLowerCase().startsWith('multipart/')) {
    return undefined
  }
  const match = /boundary=(?:"([^"]+)"|([^;\s]+))/i.exec(contentType)
  return match ? (match[1] ?? match[2]) : undefined
}

/**
 * Split a multipart body into its parts. Header names are lower-cased.
 */
export function parseMultipart(text: string, boundary: string): MultipartPart[] {
  const delimiter = `--${boundary}`
  const parts: MultipartPart[] = []

  const sections = text.split(delimiter)
  // The first section is the preamble, anything after "--boundary--" the epilogue
  for (const section of sections.slice(1)) {
    if (section.startsWith('--')) {
      break
    }

    const content = section.replace(/^\r?\n/, '').replace(/\r?\n$/, '')
    const separator = /\r?\n\r?\n/.exec(content)
    const rawHeaders = separator ? content.slice(0, separator.index) : ''
    const body = separator ? content.slice(separator.index + separator[0].length) : content

    const headers: Record<string, string> = {}
    for (const line of rawHeaders.split(/\r?\n/)) {
      const colon = line.indexOf(':')
      if (colon > 0) {
        headers[line.slice(0, colon).trim().toLowerCase()] = line.slice(colon + 1).trim()
      }
    }

    parts.push({ headers, body })
  }

  return parts
}
