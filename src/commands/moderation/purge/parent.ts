/**
 * Motivación: agrupar los subcomandos de "purge" (borrado masivo de mensajes del canal actual).
 */
import { AutoLoad, Command, Declare } from "seyfert";

@Declare({
  name: "purge",
  description: "Bulk-delete messages in this channel",
  defaultMemberPermissions: ["ManageMessages"],
  botPermissions: ["ManageMessages", "ReadMessageHistory"],
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@AutoLoad()
export default class PurgeParent extends Command {}
