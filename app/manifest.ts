import type { MetadataRoute } from 'next'

export default function manifest(): MetadataRoute.Manifest {
  return {
    name: 'Streamyyy',
    short_name: 'Streamyyy',
    description: 'Watch several live streams at once',
    start_url: '/',
    display: 'standalone',
    background_color: '#000000',
    theme_color: '#000000'
  }
}
