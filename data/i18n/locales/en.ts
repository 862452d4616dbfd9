export const enMessages = {
  'app.title': 'Streamyyy',
  'app.tagline': 'Watch several live streams at once',
  'app.empty': 'Paste a Twitch, YouTube, Kick or Rumble link to start watching',
  'app.loading': 'Loading...',
  'app.settings': 'Settings',
  'app.account': 'Account',
  'app.subscription': 'Subscription',
  'app.layout': 'Layout',
  'app.masterMute': 'Mute everything',
  'app.masterUnmute': 'Unmute everything',
  'app.library': 'Favorites and history',
  'app.muteAll': 'Mute all streams',
  'app.masterVolume': 'Master volume',
  'app.onboardingTitle': 'Getting started',
  'app.onboardingShortcuts': 'Press ] and [ to move audio between streams, m to mute everything and Esc to leave focus.',
  'app.onboardingDismiss': 'Got it',
  'input.label': 'Stream link',
  'input.placeholder': 'Paste a stream link (twitch.tv/..., youtube.com/watch?v=...)',
  'input.add': 'Add stream',
  'layout.title': 'Choose a layout',
  'layout.presets': 'Layouts',
  'layout.bento': 'Bento',
  'layout.exitFocus': 'Exit focus',
  'audio.mode': 'Audio',
  'audio.focusedOnly': 'Focused stream only',
  'audio.all': 'All streams',
  'audio.manual': 'Manual',
  'slot.empty': 'Empty slot {index}',
  'slot.loading': 'Loading stream...',
  'slot.failed': 'This stream could not be loaded.',
  'slot.timeout': 'The player took too long to load.',
  'slot.retry': 'Retry',
  'slot.attempt': 'Attempt {count} of {max}',
  'slot.terminal': 'Giving up after several attempts. Remove the stream or add it again.',
  'slot.remove': 'Remove stream',
  'slot.removeConfirm': 'Remove this stream from the layout?',
  'slot.focus': 'Focus',
  'slot.mute': 'Mute',
  'slot.unmute': 'Unmute',
  'slot.solo': 'Solo',
  'slot.moveEarlier': 'Move earlier',
  'slot.moveLater': 'Move later',
  'slot.favorite': 'Add to favorites',
  'slot.unfavorite': 'Remove from favorites',
  'library.title': 'Favorites and history',
  'library.favorites': 'Favorites',
  'library.recent': 'Recently watched',
  'library.noFavorites': 'No favorites yet. Use the star on a stream to save it.',
  'library.noRecent': 'Streams you add will show up here.',
  'library.add': 'Add {title}',
  'library.removeFavorite': 'Remove {title} from favorites',
  'library.clearRecent': 'Clear history',
  'common.cancel': 'Cancel',
  'common.close': 'Close',
  'settings.title': 'Settings',
  'settings.autoplay': 'Autoplay streams',
  'settings.showSecondary': 'Show other streams while focused',
  'settings.quality': 'Preferred quality',
  'settings.qualityAuto': 'Automatic',
  'settings.defaultLayout': 'Default layout',
  'settings.audioMode': 'Audio mode',
  'settings.language': 'Language',
  'settings.reset': 'Restore defaults',
  'account.title': 'Account',
  'account.signIn': 'Sign in',
  'account.signUp': 'Create account',
  'account.signOut': 'Sign out',
  'account.resetPassword': 'Send reset link',
  'account.resetSent': 'Check your inbox for a reset link.',
  'account.email': 'Email',
  'account.password': 'Password',
  'account.firstName': 'First name',
  'account.lastName': 'Last name',
  'account.continueWith': 'Continue with {provider}',
  'account.signedInAs': 'Signed in as {email}',
  'account.plan': 'Plan: {plan}',
  'account.manageSubscription': 'Manage subscription',
  'account.forgotPassword': 'Forgot your password?',
  'account.backToSignIn': 'Back to sign in',
  'account.working': 'Please wait...',
  'subscription.title': 'Subscription',
  'subscription.monthly': 'Monthly',
  'subscription.yearly': 'Yearly',
  'subscription.save': 'Save {percent}%',
  'subscription.streams': '{count} simultaneous streams',
  'subscription.unlimited': 'Unlimited streams',
  'subscription.current': 'Current plan',
  'subscription.choose': 'Choose {plan}',
  'subscription.perMonth': '/month',
  'subscription.perYear': '/year',
  'subscription.paymentMethods': 'Payment methods',
  'subscription.noPaymentMethods': 'No saved payment methods.',
  'subscription.makeDefault': 'Make default',
  'subscription.default': 'Default',
  'subscription.delete': 'Delete',
  'subscription.expires': 'Expires {month}/{year}',
  'subscription.cancel': 'Cancel subscription',
  'subscription.endsOn': 'Ends on {date}',
  'subscription.signInRequired': 'Sign in to manage your subscription.'
} satisfies Record<string, string>
