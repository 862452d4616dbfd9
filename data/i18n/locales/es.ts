import type { LocaleMessages } from '../types'

export const esMessages: LocaleMessages = {
  'app.title': 'Streamyyy',
  'app.tagline': 'Mira varios directos a la vez',
  'app.empty': 'Pega un enlace de Twitch, YouTube, Kick o Rumble para empezar',
  'app.loading': 'Cargando...',
  'app.settings': 'Ajustes',
  'app.account': 'Cuenta',
  'app.subscription': 'Suscripción',
  'app.layout': 'Diseño',
  'app.masterMute': 'Silenciar todo',
  'app.masterUnmute': 'Activar sonido',
  'app.library': 'Favoritos e historial',
  'app.muteAll': 'Silenciar todos los directos',
  'app.masterVolume': 'Volumen general',
  'app.onboardingTitle': 'Primeros pasos',
  'app.onboardingShortcuts': 'Pulsa ] y [ para mover el audio entre directos, m para silenciar todo y Esc para salir del enfoque.',
  'app.onboardingDismiss': 'Entendido',
  'input.label': 'Enlace del directo',
  'input.placeholder': 'Pega un enlace (twitch.tv/..., youtube.com/watch?v=...)',
  'input.add': 'Agregar directo',
  'layout.title': 'Elige un diseño',
  'layout.presets': 'Diseños',
  'layout.bento': 'Bento',
  'layout.exitFocus': 'Salir del enfoque',
  'audio.mode': 'Audio',
  'audio.focusedOnly': 'Solo el directo enfocado',
  'audio.all': 'Todos los directos',
  'audio.manual': 'Manual',
  'slot.empty': 'Espacio vacío {index}',
  'slot.loading': 'Cargando directo...',
  'slot.failed': 'No se pudo cargar este directo.',
  'slot.timeout': 'El reproductor tardó demasiado en cargar.',
  'slot.retry': 'Reintentar',
  'slot.attempt': 'Intento {count} de {max}',
  'slot.terminal': 'Se agotaron los intentos. Elimina el directo o agrégalo de nuevo.',
  'slot.remove': 'Eliminar directo',
  'slot.removeConfirm': '¿Eliminar este directo del diseño?',
  'slot.focus': 'Enfocar',
  'slot.mute': 'Silenciar',
  'slot.unmute': 'Activar sonido',
  'slot.solo': 'Solo',
  'slot.moveEarlier': 'Mover antes',
  'slot.moveLater': 'Mover después',
  'slot.favorite': 'Añadir a favoritos',
  'slot.unfavorite': 'Quitar de favoritos',
  'library.title': 'Favoritos e historial',
  'library.favorites': 'Favoritos',
  'library.recent': 'Vistos recientemente',
  'library.noFavorites': 'Aún no hay favoritos. Usa la estrella de un directo para guardarlo.',
  'library.noRecent': 'Los directos que añadas aparecerán aquí.',
  'library.add': 'Añadir {title}',
  'library.removeFavorite': 'Quitar {title} de favoritos',
  'library.clearRecent': 'Borrar historial',
  'common.cancel': 'Cancelar',
  'common.close': 'Cerrar',
  'settings.title': 'Ajustes',
  'settings.autoplay': 'Reproducir automáticamente',
  'settings.showSecondary': 'Mostrar los demás directos al enfocar',
  'settings.quality': 'Calidad preferida',
  'settings.qualityAuto': 'Automática',
  'settings.defaultLayout': 'Diseño predeterminado',
  'settings.audioMode': 'Modo de audio',
  'settings.language': 'Idioma',
  'settings.reset': 'Restaurar valores',
  'account.title': 'Cuenta',
  'account.signIn': 'Iniciar sesión',
  'account.signUp': 'Crear cuenta',
  'account.signOut': 'Cerrar sesión',
  'account.resetPassword': 'Enviar enlace',
  'account.resetSent': 'Revisa tu correo para restablecer la contraseña.',
  'account.email': 'Correo',
  'account.password': 'Contraseña',
  'account.firstName': 'Nombre',
  'account.lastName': 'Apellido',
  'account.continueWith': 'Continuar con {provider}',
  'account.signedInAs': 'Sesión iniciada como {email}',
  'account.plan': 'Plan: {plan}',
  'account.manageSubscription': 'Gestionar suscripción',
  'account.forgotPassword': '¿Olvidaste tu contraseña?',
  'account.backToSignIn': 'Volver a iniciar sesión',
  'account.working': 'Un momento...',
  'subscription.title': 'Suscripción',
  'subscription.monthly': 'Mensual',
  'subscription.yearly': 'Anual',
  'subscription.save': 'Ahorra {percent}%',
  'subscription.streams': '{count} directos simultáneos',
  'subscription.unlimited': 'Directos ilimitados',
  'subscription.current': 'Plan actual',
  'subscription.choose': 'Elegir {plan}',
  'subscription.perMonth': '/mes',
  'subscription.perYear': '/año',
  'subscription.paymentMethods': 'Métodos de pago',
  'subscription.noPaymentMethods': 'No hay métodos de pago guardados.',
  'subscription.makeDefault': 'Usar por defecto',
  'subscription.default': 'Predeterminado',
  'subscription.delete': 'Eliminar',
  'subscription.expires': 'Vence {month}/{year}',
  'subscription.cancel': 'Cancelar suscripción',
  'subscription.endsOn': 'Termina el {date}',
  'subscription.signInRequired': 'Inicia sesión para gestionar tu suscripción.'
}
