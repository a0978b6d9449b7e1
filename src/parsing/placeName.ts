import { cleanText } from '../utils/helpers.js'

/**
 * Turns a topic title into the name handed to the geocoder
 */
export type PlaceNamePolicy = (title: string) => string

/**
 * Pond threads are titled after the pond, so the cleaned title is the place name
 */
export const titleAsPlaceName: PlaceNamePolicy = (title) => cleanText(title)
