import fs from 'fs'
import https from 'https'
import http from 'http'
import { URL } from 'url'

/** Abort a download that sends nothing for this long. */
const DOWNLOAD_IDLE_TIMEOUT_MS = 60 * 1000

function removePartial(outputPath: string): void {
  fs.rmSync(outputPath, { force: true })
}

/**
 * Stream a URL to a file. Rejects on non-200 or any network/disk error; the partial file is removed before rejecting.
 */
export function downloadVideoFromURL(url: string, outputPath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const parsedUrl = new URL(url)
    const file = fs.createWriteStream(outputPath)
    let settled = false

    const failWith = (err: Error) => {
      if (settled) return
      settled = true
      file.destroy()
      try {
        removePartial(outputPath)
      } catch (cleanupErr) {
        reject(cleanupErr)
        return
      }
      reject(err)
    }

    file.on('error', failWith)

    const onResponse = (response: http.IncomingMessage) => {
      if (response.statusCode !== 200) {
        response.resume()
        failWith(new Error(`Failed to download: HTTP ${response.statusCode}`))
        return
      }

      response.on('error', failWith)
      response.pipe(file)

      file.on('finish', () => {
        file.close((err) => {
          if (err) {
            failWith(err)
            return
          }
          if (settled) return
          settled = true
          resolve(outputPath)
        })
      })
    }

    const request =
      parsedUrl.protocol === 'https:' ? https.get(parsedUrl, onResponse) : http.get(parsedUrl, onResponse)

    request.setTimeout(DOWNLOAD_IDLE_TIMEOUT_MS, () => {
      request.destroy(new Error(`Download stalled for ${DOWNLOAD_IDLE_TIMEOUT_MS / 1000}s`))
    })
    request.on('error', failWith)
  })
}
