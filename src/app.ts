import path from 'node:path'
import { fileURLToPath } from 'node:url'
import fastifyAutoload from '@fastify/autoload'
import type { ConfigPluginOptions } from '@plugins/external/env.js'
import type { FastifyInstance, FastifyPluginOptions } from 'fastify'

const __dirname = path.dirname(fileURLToPath(import.meta.url))

export type AppOptions = FastifyPluginOptions & ConfigPluginOptions

/**
 * Registers the configuration plugin, then one plugin per service.
 *
 * No routes are loaded; the instance only wires services together for a
 * single sync run.
 */
export default async function serviceApp(
  fastify: FastifyInstance,
  opts: AppOptions,
) {
  // Load external plugins
  await fastify.register(fastifyAutoload, {
    dir: path.join(__dirname, 'plugins/external'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  // Load custom plugins
  await fastify.register(fastifyAutoload, {
    dir: path.join(__dirname, 'plugins/custom'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })
}
