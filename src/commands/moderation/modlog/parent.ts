/**
 * Motivación: agrupar la configuración del canal de registro de moderación.
 */
import { AutoLoad, Command, Declare } from "seyfert";

@Declare({
  name: "modlog",
  description: "Configure where moderation events are posted",
  defaultMemberPermissions: ["Administrator"],
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@AutoLoad()
export default class ModLogParent extends Command {}
