// SPDX-License-Identifier: GPL-2.0-or-later

/** Malformed keymap model detected while laying out the board */
export class KeymapShapeError extends Error {
  override name = 'KeymapShapeError'
}

/** Keymap document text that could not be parsed or validated */
export class KeymapParseError extends Error {
  override name = 'KeymapParseError'
  readonly issues: string[]

  constructor(issues: string[]) {
    super(issues.length === 1 ? issues[0] : `${issues.length} problems in keymap document`)
    this.issues = issues
  }
}
