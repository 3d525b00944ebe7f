/**
 * Motivación: agrupar los subcomandos de "infraction" para consultar y administrar el historial de sanciones.
 */
import { AutoLoad, Command, Declare } from "seyfert";

@Declare({
  name: "infraction",
  description: "Look up and manage recorded infractions",
  defaultMemberPermissions: ["ManageMessages"],
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@AutoLoad()
export default class InfractionParent extends Command {}
