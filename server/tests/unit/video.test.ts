import fs from 'fs'
import http from 'http'
import path from 'path'
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest'
import { downloadVideoFromURL } from '../../src/services/video'
import { makeTempDir, removeDir } from '../helpers'

describe('downloadVideoFromURL', () => {
  let server: http.Server
  let baseUrl: string
  let dir: string

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      if (req.url === '/file.mp4') {
        res.writeHead(200, { 'Content-Type': 'video/mp4' })
        res.end('video-bytes')
        return
      }
      res.writeHead(404)
      res.end('missing')
    })
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()))
    const address = server.address()
    if (!address || typeof address === 'string') throw new Error('Test server has no TCP address')
    baseUrl = `http://127.0.0.1:${address.port}`
  })

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())))
  })

  beforeEach(async () => {
    dir = await makeTempDir()
  })

  afterEach(async () => {
    await removeDir(dir)
  })

  it('streams the body to the output path', async () => {
    const output = path.join(dir, 'out.mp4')

    await expect(downloadVideoFromURL(`${baseUrl}/file.mp4`, output)).resolves.toBe(output)
    expect(await fs.promises.readFile(output, 'utf8')).toBe('video-bytes')
  })

  it('rejects a non-200 response and removes the file', async () => {
    const output = path.join(dir, 'out.mp4')

    await expect(downloadVideoFromURL(`${baseUrl}/gone.mp4`, output)).rejects.toThrowError(
      'Failed to download: HTTP 404'
    )
    expect(fs.existsSync(output)).toBe(false)
  })
})
