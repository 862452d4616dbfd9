// next-pwa 5 publishes no type declarations.
declare module 'next-pwa' {
  import type { NextConfig } from 'next'

  interface PwaOptions {
    dest: string
    disable?: boolean
    register?: boolean
    skipWaiting?: boolean
    scope?: string
    sw?: string
  }

  export default function withPWA(options: PwaOptions): (config: NextConfig) => NextConfig
}
