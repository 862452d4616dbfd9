'use client'

import { useState } from 'react'
import type { FC, FormEvent } from 'react'
import { LogOut } from 'lucide-react'
import { useI18n } from '@components/i18n'
import { useServices } from '@components/SessionProvider'
import {
  useCurrentUser,
  useResetPassword,
  useSignIn,
  useSignOut,
  useSignUp
} from '@components/account-queries'
import { planById } from '@data/plans'
import { toUserMessage } from '@lib/errors'
import type { OAuthProvider } from '@lib/services/auth'
import { Button } from '@ui/button'
import { Dialog, DialogContent, DialogHeader, DialogTitle } from '@ui/dialog'

type Mode = 'signIn' | 'signUp' | 'reset'

interface AccountDialogProps {
  open: boolean
  onOpenChange: (open: boolean) => void
  onManageSubscription: () => void
}

const OAUTH_PROVIDERS: { id: OAuthProvider; label: string }[] = [
  { id: 'google', label: 'Google' },
  { id: 'apple', label: 'Apple' }
]

const inputClass =
  'w-full bg-gray-950 border border-gray-700 rounded px-3 py-2 text-sm text-white focus:outline-none focus:border-blue-500'

export const AccountDialog: FC<AccountDialogProps> = ({ open, onOpenChange, onManageSubscription }) => {
  const { t } = useI18n()
  const { auth } = useServices()
  const user = useCurrentUser()
  const signIn = useSignIn()
  const signUp = useSignUp()
  const signOut = useSignOut()
  const resetPassword = useResetPassword()

  const [mode, setMode] = useState<Mode>('signIn')
  const [email, setEmail] = useState('')
  const [password, setPassword] = useState('')
  const [firstName, setFirstName] = useState('')
  const [lastName, setLastName] = useState('')

  const active = mode === 'signIn' ? signIn : mode === 'signUp' ? signUp : resetPassword
  const isWorking = active.isPending || signOut.isPending
  const error = active.error ?? signOut.error ?? user.error

  const switchMode = (next: Mode): void => {
    signIn.reset()
    signUp.reset()
    resetPassword.reset()
    setMode(next)
  }

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault()
    if (mode === 'signIn') signIn.mutate({ email, password })
    else if (mode === 'signUp') signUp.mutate({ email, password, firstName, lastName })
    else resetPassword.mutate(email)
  }

  const startOAuth = (provider: OAuthProvider): void => {
    window.location.assign(auth.oauthUrl(provider, window.location.href))
  }

  const current = user.data

  return (
    <Dialog open={open} onOpenChange={onOpenChange}>
      <DialogContent closeLabel={t('common.close')} className="max-w-sm">
        <DialogHeader>
          <DialogTitle>{t('account.title')}</DialogTitle>
        </DialogHeader>

        {current ? (
          <div className="space-y-3 text-sm text-gray-300">
            <p>{t('account.signedInAs', { email: current.email })}</p>
            <p className="text-gray-400">{t('account.plan', { plan: planById(current.plan).name })}</p>
            <div className="flex flex-col gap-2">
              <Button variant="outline" onClick={onManageSubscription}>
                {t('account.manageSubscription')}
              </Button>
              <Button variant="ghost" disabled={isWorking} onClick={() => signOut.mutate()}>
                <LogOut className="size-4" />
                {t('account.signOut')}
              </Button>
            </div>
          </div>
        ) : (
          <form onSubmit={handleSubmit} className="space-y-3">
            {mode === 'signUp' && (
              <div className="grid grid-cols-2 gap-2">
                <input
                  aria-label={t('account.firstName')}
                  placeholder={t('account.firstName')}
                  className={inputClass}
                  value={firstName}
                  onChange={(event) => setFirstName(event.target.value)}
                />
                <input
                  aria-label={t('account.lastName')}
                  placeholder={t('account.lastName')}
                  className={inputClass}
                  value={lastName}
                  onChange={(event) => setLastName(event.target.value)}
                />
              </div>
            )}
            <input
              type="email"
              aria-label={t('account.email')}
              placeholder={t('account.email')}
              autoComplete="email"
              className={inputClass}
              value={email}
              onChange={(event) => setEmail(event.target.value)}
            />
            {mode !== 'reset' && (
              <input
                type="password"
                aria-label={t('account.password')}
                placeholder={t('account.password')}
                autoComplete={mode === 'signUp' ? 'new-password' : 'current-password'}
                className={inputClass}
                value={password}
                onChange={(event) => setPassword(event.target.value)}
              />
            )}

            {error && (
              <p role="alert" className="text-xs text-red-300">
                {toUserMessage(error)}
              </p>
            )}
            {mode === 'reset' && resetPassword.isSuccess && (
              <p className="text-xs text-green-300">{t('account.resetSent')}</p>
            )}

            <Button type="submit" className="w-full" disabled={isWorking}>
              {isWorking
                ? t('account.working')
                : mode === 'signIn'
                  ? t('account.signIn')
                  : mode === 'signUp'
                    ? t('account.signUp')
                    : t('account.resetPassword')}
            </Button>

            {mode !== 'reset' && (
              <div className="grid grid-cols-2 gap-2">
                {OAUTH_PROVIDERS.map((provider) => (
                  <Button
                    key={provider.id}
                    type="button"
                    variant="outline"
                    onClick={() => startOAuth(provider.id)}
                  >
                    {t('account.continueWith', { provider: provider.label })}
                  </Button>
                ))}
              </div>
            )}

            <div className="flex flex-wrap justify-between gap-2 text-xs">
              {mode === 'signIn' ? (
                <>
                  <Button type="button" variant="link" size="sm" onClick={() => switchMode('signUp')}>
                    {t('account.signUp')}
                  </Button>
                  <Button type="button" variant="link" size="sm" onClick={() => switchMode('reset')}>
                    {t('account.forgotPassword')}
                  </Button>
                </>
              ) : (
                <Button type="button" variant="link" size="sm" onClick={() => switchMode('signIn')}>
                  {t('account.backToSignIn')}
                </Button>
              )}
            </div>
          </form>
        )}
      </DialogContent>
    </Dialog>
  )
}
