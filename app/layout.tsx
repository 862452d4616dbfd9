import type { Metadata, Viewport } from 'next'
import './globals.css'

const DESCRIPTION =
  'Watch several Twitch, YouTube, Kick and Rumble streams side by side in grid, picture-in-picture, mosaic and bento layouts.'

export const metadata: Metadata = {
  title: 'Streamyyy',
  description: DESCRIPTION,
  manifest: '/manifest.webmanifest',
  openGraph: {
    title: 'Streamyyy',
    description: DESCRIPTION,
    siteName: 'Streamyyy',
    type: 'website'
  },
  twitter: {
    card: 'summary',
    title: 'Streamyyy',
    description: DESCRIPTION
  },
  appleWebApp: {
    capable: true,
    statusBarStyle: 'black',
    title: 'Streamyyy'
  }
}

export const viewport: Viewport = {
  width: 'device-width',
  initialScale: 1,
  viewportFit: 'cover',
  themeColor: '#000000'
}

export default function RootLayout({ children }: Readonly<{ children: React.ReactNode }>) {
  return (
    <html lang="en">
      <body>{children}</body>
    </html>
  )
}
