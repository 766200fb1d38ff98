import { describeCloudsSourceContract } from "../../../ports/__tests__/clouds-source.contract"
import { ObjectSource } from "../object-source"

describeCloudsSourceContract({
  name: "ObjectSource",
  make: async () => ({
    source: new ObjectSource({ clouds: { alpha: { auth: { username: "u" } } } }),
  }),
  setup: async () => {},
  expectedValue: () => ({ clouds: { alpha: { auth: { username: "u" } } } }),
})
