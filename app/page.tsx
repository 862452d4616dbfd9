import { AppClient } from '@components/AppClient'

export default function Home() {
  return <AppClient />
}
