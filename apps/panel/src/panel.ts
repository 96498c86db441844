/**
 * Composicion de los servicios del panel a partir de la configuracion.
 */
import type { ConfiguracionPanel } from './configuracion';
import type { Registrador } from './infraestructura/logging/logger';
import { crearServicioCreacionExamen } from './modulos/modulo_examenes/servicioCreacionExamen';
import { crearServicioExamenes } from './modulos/modulo_examenes/servicioExamenes';
import { crearServicioPreguntas } from './modulos/modulo_preguntas/servicioPreguntas';
import { crearServicioEnvio } from './modulos/modulo_respuestas/servicioEnvio';
import { crearServicioUsuarios } from './modulos/modulo_usuarios/servicioUsuarios';
import { crearClienteApi } from './servicios_api/clienteApi';

export function crearServiciosPanel(
  config: ConfiguracionPanel,
  extras: { fetcher?: typeof fetch; registrar?: Registrador } = {}
) {
  const cliente = crearClienteApi({
    baseUrl: config.apiBaseUrl,
    token: config.token,
    rutas: { resultados: config.rutaResultados },
    timeoutMs: config.tiempoEsperaMs,
    profundidadMaxima: config.profundidadMaximaJson,
    fetcher: extras.fetcher,
    registrar: extras.registrar
  });
  const examenes = crearServicioExamenes(cliente);
  const preguntas = crearServicioPreguntas(cliente);

  return {
    cliente,
    examenes,
    preguntas,
    creacion: crearServicioCreacionExamen({ examenes, preguntas, registrar: cliente.registrar }),
    envio: crearServicioEnvio(cliente),
    usuarios: crearServicioUsuarios(cliente)
  };
}

export type ServiciosPanel = ReturnType<typeof crearServiciosPanel>;
