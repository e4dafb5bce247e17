import type { RequestHandler } from 'express'

export const SERVICE_NAME = 'Message Relay API'

export function createHealthHandler(): RequestHandler {
  return (_req, res) => {
    res.json({
      service: SERVICE_NAME,
      status: 'healthy',
      timestamp: new Date().toISOString()
    })
  }
}
