/**
 * MCP tool for Google Photos library operations
 */

import type { ApiSession, ListPhotosInput, SearchPhotosInput, SessionRequestOptions } from '../google/index.js'
import { formatDownloadUrl, formatPhotoList, formatPhotoSearch } from './formatters.js'

export interface PhotosToolOptions {
  session: ApiSession
}

export class PhotosTool {
  private readonly session: ApiSession

  constructor(options: PhotosToolOptions) {
    this.session = options.session
  }

  async listPhotos(input: ListPhotosInput, options?: SessionRequestOptions): Promise<string> {
    const photos = await this.session.listPhotos(input, options)
    return formatPhotoList(photos)
  }

  async searchPhotos(input: SearchPhotosInput, options?: SessionRequestOptions): Promise<string> {
    const photos = await this.session.searchPhotos(input, options)
    return formatPhotoSearch(photos, input)
  }

  /**
   * The returned URL is short-lived and is never cached
   */
  async getDownloadUrl(photoId: string, options?: SessionRequestOptions): Promise<string> {
    const url = await this.session.resolveDownloadUrl(photoId, options)
    return formatDownloadUrl(photoId, url)
  }
}
