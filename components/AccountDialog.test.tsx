import { describe, expect, it, vi } from 'vitest'
import { screen } from '@testing-library/react'
import userEvent from '@testing-library/user-event'
import { AuthError } from '@lib/errors'
import type { AuthUser } from '@lib/services/auth'
import { createFakeAuth, createTestServices, renderWithProviders } from '@/test/render'
import { AccountDialog } from './AccountDialog'

const member: AuthUser = {
  id: 'user-1',
  email: 'viewer@example.com',
  firstName: 'Sam',
  lastName: 'Viewer',
  plan: 'premium'
}

const renderDialog = (auth = createFakeAuth()) =>
  renderWithProviders(
    <AccountDialog open onOpenChange={vi.fn()} onManageSubscription={vi.fn()} />,
    createTestServices({ auth })
  )

describe('AccountDialog', () => {
  it('signs in and shows the account summary', async () => {
    const user = userEvent.setup()
    const auth = createFakeAuth({ signIn: vi.fn(async () => member) })
    renderDialog(auth)

    await user.type(screen.getByLabelText('Email'), 'viewer@example.com')
    await user.type(screen.getByLabelText('Password'), 'test-secret')
    await user.click(screen.getByRole('button', { name: 'Sign in' }))

    expect(auth.signIn).toHaveBeenCalledWith('viewer@example.com', 'test-secret')
    expect(await screen.findByText('Signed in as viewer@example.com')).toBeInTheDocument()
    expect(screen.getByText('Plan: Premium')).toBeInTheDocument()
  })

  it('shows the backend message when sign-in is rejected', async () => {
    const user = userEvent.setup()
    const auth = createFakeAuth({
      signIn: vi.fn(async () => {
        throw new AuthError('Invalid email or password.', 401)
      })
    })
    renderDialog(auth)

    await user.type(screen.getByLabelText('Email'), 'viewer@example.com')
    await user.type(screen.getByLabelText('Password'), 'wrong-password')
    await user.click(screen.getByRole('button', { name: 'Sign in' }))

    expect(await screen.findByRole('alert')).toHaveTextContent('Invalid email or password.')
  })

  it('switches to the reset form and confirms the email was sent', async () => {
    const user = userEvent.setup()
    const auth = createFakeAuth()
    renderDialog(auth)

    await user.click(screen.getByRole('button', { name: 'Forgot your password?' }))
    expect(screen.queryByLabelText('Password')).not.toBeInTheDocument()

    await user.type(screen.getByLabelText('Email'), 'viewer@example.com')
    await user.click(screen.getByRole('button', { name: 'Send reset link' }))

    expect(auth.resetPassword).toHaveBeenCalledWith('viewer@example.com')
    expect(await screen.findByText('Check your inbox for a reset link.')).toBeInTheDocument()
  })
})
