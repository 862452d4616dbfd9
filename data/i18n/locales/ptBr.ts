import type { LocaleMessages } from '../types'

export const ptBrMessages: LocaleMessages = {
  'app.title': 'Streamyyy',
  'app.tagline': 'Assista a várias lives ao mesmo tempo',
  'app.empty': 'Cole um link da Twitch, YouTube, Kick ou Rumble para começar',
  'app.loading': 'Carregando...',
  'app.settings': 'Configurações',
  'app.account': 'Conta',
  'app.subscription': 'Assinatura',
  'app.layout': 'Layout',
  'app.masterMute': 'Silenciar tudo',
  'app.masterUnmute': 'Ativar som',
  'app.library': 'Favoritos e histórico',
  'app.muteAll': 'Silenciar todas as lives',
  'app.masterVolume': 'Volume geral',
  'app.onboardingTitle': 'Primeiros passos',
  'app.onboardingShortcuts': 'Use ] e [ para mover o áudio entre lives, m para silenciar tudo e Esc para sair do foco.',
  'app.onboardingDismiss': 'Entendi',
  'input.label': 'Link da live',
  'input.placeholder': 'Cole um link (twitch.tv/..., youtube.com/watch?v=...)',
  'input.add': 'Adicionar live',
  'layout.title': 'Escolha um layout',
  'layout.presets': 'Layouts',
  'layout.bento': 'Bento',
  'layout.exitFocus': 'Sair do foco',
  'audio.mode': 'Áudio',
  'audio.focusedOnly': 'Só a live em foco',
  'audio.all': 'Todas as lives',
  'audio.manual': 'Manual',
  'slot.empty': 'Espaço vazio {index}',
  'slot.loading': 'Carregando live...',
  'slot.failed': 'Não foi possível carregar esta live.',
  'slot.timeout': 'O player demorou demais para carregar.',
  'slot.retry': 'Tentar de novo',
  'slot.attempt': 'Tentativa {count} de {max}',
  'slot.terminal': 'As tentativas acabaram. Remova a live ou adicione de novo.',
  'slot.remove': 'Remover live',
  'slot.removeConfirm': 'Remover esta live do layout?',
  'slot.focus': 'Focar',
  'slot.mute': 'Silenciar',
  'slot.unmute': 'Ativar som',
  'slot.solo': 'Solo',
  'slot.moveEarlier': 'Mover para antes',
  'slot.moveLater': 'Mover para depois',
  'slot.favorite': 'Adicionar aos favoritos',
  'slot.unfavorite': 'Remover dos favoritos',
  'library.title': 'Favoritos e histórico',
  'library.favorites': 'Favoritos',
  'library.recent': 'Assistidos recentemente',
  'library.noFavorites': 'Nenhum favorito ainda. Use a estrela de uma live para salvá-la.',
  'library.noRecent': 'As lives que você adicionar aparecem aqui.',
  'library.add': 'Adicionar {title}',
  'library.removeFavorite': 'Remover {title} dos favoritos',
  'library.clearRecent': 'Limpar histórico',
  'common.cancel': 'Cancelar',
  'common.close': 'Fechar',
  'settings.title': 'Configurações',
  'settings.autoplay': 'Reproduzir automaticamente',
  'settings.showSecondary': 'Mostrar as outras lives no modo foco',
  'settings.quality': 'Qualidade preferida',
  'settings.qualityAuto': 'Automática',
  'settings.defaultLayout': 'Layout padrão',
  'settings.audioMode': 'Modo de áudio',
  'settings.language': 'Idioma',
  'settings.reset': 'Restaurar padrões',
  'account.title': 'Conta',
  'account.signIn': 'Entrar',
  'account.signUp': 'Criar conta',
  'account.signOut': 'Sair',
  'account.resetPassword': 'Enviar link',
  'account.resetSent': 'Confira seu e-mail para redefinir a senha.',
  'account.email': 'E-mail',
  'account.password': 'Senha',
  'account.firstName': 'Nome',
  'account.lastName': 'Sobrenome',
  'account.continueWith': 'Continuar com {provider}',
  'account.signedInAs': 'Conectado como {email}',
  'account.plan': 'Plano: {plan}',
  'account.manageSubscription': 'Gerenciar assinatura',
  'account.forgotPassword': 'Esqueceu a senha?',
  'account.backToSignIn': 'Voltar para entrar',
  'account.working': 'Aguarde...',
  'subscription.title': 'Assinatura',
  'subscription.monthly': 'Mensal',
  'subscription.yearly': 'Anual',
  'subscription.save': 'Economize {percent}%',
  'subscription.streams': '{count} lives simultâneas',
  'subscription.unlimited': 'Lives ilimitadas',
  'subscription.current': 'Plano atual',
  'subscription.choose': 'Escolher {plan}',
  'subscription.perMonth': '/mês',
  'subscription.perYear': '/ano',
  'subscription.paymentMethods': 'Formas de pagamento',
  'subscription.noPaymentMethods': 'Nenhuma forma de pagamento salva.',
  'subscription.makeDefault': 'Tornar padrão',
  'subscription.default': 'Padrão',
  'subscription.delete': 'Excluir',
  'subscription.expires': 'Vence em {month}/{year}',
  'subscription.cancel': 'Cancelar assinatura',
  'subscription.endsOn': 'Termina em {date}',
  'subscription.signInRequired': 'Entre para gerenciar sua assinatura.'
}
