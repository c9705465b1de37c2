import type { HttpRequest, HttpResponse } from './parser.js'

export type RouteParams = Record<string, string>
export type RouteHandler = (req: HttpRequest, params: RouteParams) => HttpResponse | Promise<HttpResponse>

export interface RouteOptions {
  streamBody?: boolean  // hand the handler the body as a stream, unbuffered
}

export interface RouteMatch {
  handler: RouteHandler
  params: RouteParams
  streamBody: boolean
}

interface Route {
  method: string
  segments: string[]  // e.g. ['api', 'transfers', ':id', 'pause']
  handler: RouteHandler
  streamBody: boolean
}

export class Router {
  private routes: Route[] = []

  add(method: string, pattern: string, handler: RouteHandler, options: RouteOptions = {}): void {
    this.routes.push({
      method: method.toUpperCase(),
      segments: pattern.split('/').filter(Boolean),
      handler,
      streamBody: options.streamBody ?? false
    })
  }

  match(method: string, path: string): RouteMatch | null {
    const pathSegments = path.split('/').filter(Boolean)
    const upperMethod = method.toUpperCase()

    for (const route of this.routes) {
      if (route.method !== upperMethod) continue

      const params = matchRoute(route, pathSegments)
      if (params !== null) {
        return { handler: route.handler, params, streamBody: route.streamBody }
      }
    }

    return null
  }

  /** Methods registered for a path, for preflight and 405 answers. */
  allowedMethods(path: string): string[] {
    const pathSegments = path.split('/').filter(Boolean)
    const methods = new Set<string>()
    for (const route of this.routes) {
      if (matchRoute(route, pathSegments) !== null) methods.add(route.method)
    }
    return Array.from(methods)
  }
}

// Path segments arrive already percent-decoded by the parser.
function matchRoute(route: Route, pathSegments: string[]): RouteParams | null {
  if (pathSegments.length !== route.segments.length) return null

  const params: RouteParams = {}

  for (const [i, routeSeg] of route.segments.entries()) {
    const pathSeg = pathSegments[i]
    if (pathSeg === undefined) return null

    if (routeSeg.startsWith(':')) {
      params[routeSeg.slice(1)] = pathSeg
    } else if (routeSeg !== pathSeg) {
      return null
    }
  }

  return params
}
