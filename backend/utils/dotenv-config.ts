import path from 'path'
import { fileURLToPath } from 'url'
import type { DotenvConfigOptions, DotenvConfigOutput } from 'dotenv'

interface DotenvLoader {
  config(options?: DotenvConfigOptions): DotenvConfigOutput
}

const here = path.dirname(fileURLToPath(import.meta.url))

export default function dotenvConfig(dotenv: DotenvLoader, envPath = path.resolve(here, '../../.env.local')) {

  return dotenv.config({
    path: envPath,
  });

}
