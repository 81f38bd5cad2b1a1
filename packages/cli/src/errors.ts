/**
 * CLI error boundary: errors owned by the command-line layer.
 */

import { BadInput, ErrFacet, SiftError } from '@sift/core'

export const CliBoundary = SiftError.boundary('cli')

/** An environment setting holds a value the CLI cannot use. */
export const ErrInvalidSetting = CliBoundary.define('invalid_setting', {
  customProps: ErrFacet.props<{ name: string; value: string; expected: string }>(),
  facets: [BadInput],
  message: (d) => `${d.name}="${d.value}" is not valid; expected ${d.expected}`,
})
