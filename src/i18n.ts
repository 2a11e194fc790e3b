export type SupportedLocale = "ru" | "en";

type I18nKey =
  | "userNotDetected"
  | "genericFailure"
  | "welcome"
  | "storeButton"
  | "helpTitle"
  | "whoami"
  | "joinButton"
  | "joinGranted"
  | "joinAlready"
  | "joinRequiresGroup"
  | "participantsEmpty"
  | "participantsTitle"
  | "stats"
  | "broadcastUsage"
  | "broadcastNoRecipients"
  | "broadcastStarted"
  | "broadcastFinished";

const DICT: Record<SupportedLocale, Record<I18nKey, string>> = {
  ru: {
    userNotDetected: "Не удалось определить пользователя.",
    genericFailure: "Что-то пошло не так. Попробуйте позже.",
    welcome: "Добро пожаловать! 👋",
    storeButton: "🛒 Магазин",
    helpTitle: "Команды:",
    whoami: "Ваш user ID: {{userId}}",
    joinButton: "Участвовать",
    joinGranted: "Вы участвуете в розыгрыше! 🎉",
    joinAlready: "Вы уже участвуете в розыгрыше.",
    joinRequiresGroup: "Чтобы участвовать, сначала вступите в группу, затем повторите /join.",
    participantsEmpty: "Участников пока нет.",
    participantsTitle: "Участники ({{count}}):",
    stats: "Пользователей всего: {{total}}\nАктивны сегодня: {{activeToday}}\nУчастников розыгрыша: {{entries}}",
    broadcastUsage: "Формат: /sendall текст сообщения",
    broadcastNoRecipients: "Нет получателей для рассылки.",
    broadcastStarted: "Рассылка запущена. Получателей: {{total}}",
    broadcastFinished: "Рассылка завершена.\nОтправлено: {{sent}}\nОшибок: {{failed}}\nВсего: {{total}}",
  },
  en: {
    userNotDetected: "Could not detect user.",
    genericFailure: "Something went wrong. Please try again later.",
    welcome: "Welcome! 👋",
    storeButton: "🛒 Store",
    helpTitle: "Commands:",
    whoami: "Your user ID: {{userId}}",
    joinButton: "Join",
    joinGranted: "You are in the giveaway! 🎉",
    joinAlready: "You are already in the giveaway.",
    joinRequiresGroup: "Join the group first, then send /join again.",
    participantsEmpty: "No participants yet.",
    participantsTitle: "Participants ({{count}}):",
    stats: "Total users: {{total}}\nActive today: {{activeToday}}\nGiveaway entries: {{entries}}",
    broadcastUsage: "Usage: /sendall message text",
    broadcastNoRecipients: "No recipients for the broadcast.",
    broadcastStarted: "Broadcast started. Recipients: {{total}}",
    broadcastFinished: "Broadcast finished.\nSent: {{sent}}\nFailed: {{failed}}\nTotal: {{total}}",
  },
};

export function t(
  locale: SupportedLocale,
  key: I18nKey,
  vars?: Record<string, string | number>,
): string {
  const template = DICT[locale][key];
  if (!vars) {
    return template;
  }
  return Object.entries(vars).reduce(
    (acc, [varName, value]) => acc.replaceAll(`{{${varName}}}`, String(value)),
    template,
  );
}
