// CHANGE: Optional-driven URL construction for an image path
// PURITY: CORE
// INVARIANT: imageUrlFor(absent()) = absent()

import * as Optional from "../optional.js";

export const IMAGE_ENDPOINT = "https://example.com/v1/Images";

/**
 * URL for an image suffix, when there is one.
 *
 * @example
 * ```ts
 * imageUrlFor(Optional.present("Hello"))
 * // Present("https://example.com/v1/Images?imagePath=Hello")
 * ```
 */
export const imageUrlFor = (
	imageEnd: Optional.Optional<string>,
): Optional.Optional<string> =>
	Optional.map(
		imageEnd,
		(end) => `${IMAGE_ENDPOINT}?imagePath=${encodeURIComponent(end)}`,
	);
