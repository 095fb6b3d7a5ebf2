export const CONTROL_HELP = [
  '/help - mostra esta ajuda',
  '/check - verifica se existe versao nova publicada',
  '/install - confirma a instalacao do update pendente',
  '/cancel - descarta o update pendente',
  '/auto on|off - liga ou desliga a verificacao automatica no boot',
  '/status - mostra estado do update e da telemetria',
  '/battery <id>|off - abre ou fecha o painel de estatisticas de um modulo',
  '/logs [n] - mostra as ultimas n linhas do log'
] as const;
