import fsp from 'fs/promises'
import path from 'path'

// Writes next to the target then renames, so readers never see a half-written file
export async function atomicWrite(filePath: string, data: string) {
  const dir = path.dirname(filePath)
  await fsp.mkdir(dir, { recursive: true })
  const tmp = path.join(dir, `.${path.basename(filePath)}.${process.pid}.partial`)
  await fsp.writeFile(tmp, data, 'utf8')
  await fsp.rename(tmp, filePath)
}

export async function writeJson(filePath: string, value: unknown) {
  await atomicWrite(filePath, JSON.stringify(value, null, 4) + '\n')
}
