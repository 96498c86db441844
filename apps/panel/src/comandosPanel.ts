/**
 * Comandos de terminal del panel: `panel <rol> <comando> [argumentos...]`.
 *
 * Cada comando corresponde a una seccion del menu; el rol decide si puede
 * ejecutarse. Devuelve el codigo de salida (0 ok, 1 falla, 2 uso incorrecto).
 */
import { z } from 'zod';
import { mensajeUsuarioDeError } from './compartido/errores/mensajesError';
import type { ErrorPanel } from './compartido/errores/tiposError';
import { COLUMNAS_OCULTAS_EXAMEN, aFilasTabla, formatearTabla } from './compartido/utilidades/tablas';
import type { FechaIso } from './compartido/utilidades/fechas';
import { resumirCreacion } from './modulos/modulo_examenes/servicioCreacionExamen';
import { aplicarEdicion } from './modulos/modulo_examenes/servicioExamenes';
import { contarExamenesPorMes } from './modulos/modulo_examenes/servicioEstadisticas';
import { esquemaBorradorPregunta } from './modulos/modulo_preguntas/validacionesPreguntas';
import type { ServiciosPanel } from './panel';
import { ETIQUETAS_SECCION, ROLES, crearSesionPanel, esRolPanel } from './sesion/sesionPanel';
import type { SeccionPanel, SesionPanel } from './sesion/sesionPanel';

export type DependenciasComandos = {
  servicios: ServiciosPanel;
  escribir: (linea: string) => void;
  leerArchivo: (ruta: string) => Promise<string>;
  hoy: () => FechaIso;
};

type ContextoComando = DependenciasComandos & {
  sesion: SesionPanel;
  argumentos: readonly string[];
};

type Comando = {
  seccion: SeccionPanel;
  descripcion: string;
  ejecutar: (ctx: ContextoComando) => Promise<number>;
};

const esquemaArchivoCreacion = z.object({
  examen: z.object({
    titulo: z.string(),
    descripcion: z.string().optional(),
    fechaInicio: z.string(),
    fechaFin: z.string(),
    creadorId: z.number()
  }),
  preguntas: z.array(esquemaBorradorPregunta).default([])
});

const esquemaArchivoEdicion = z.object({
  titulo: z.string().optional(),
  descripcion: z.string().optional(),
  fechaInicio: z.string().optional(),
  fechaFin: z.string().optional()
});

const esquemaArchivoRespuestas = z.object({
  examenId: z.number().int().positive(),
  respuestas: z.record(
    z.string().regex(/^\d+$/, 'Las claves deben ser ids de pregunta'),
    z.discriminatedUnion('tipo', [
      z.object({ tipo: z.literal('SELECCION_UNICA'), etiqueta: z.string() }),
      z.object({ tipo: z.literal('TEXTO_ABIERTO'), texto: z.string() })
    ])
  )
});

function reportarError(ctx: ContextoComando, error: ErrorPanel) {
  ctx.escribir(`Error: ${mensajeUsuarioDeError(error)}`);
  return 1;
}

function escribirLineas(ctx: ContextoComando, lineas: readonly string[]) {
  for (const linea of lineas) ctx.escribir(linea);
}

function leerId(ctx: ContextoComando): number | null {
  const id = Number(ctx.argumentos[0]);
  if (!Number.isInteger(id) || id <= 0) {
    ctx.escribir('Se requiere un id de examen numerico.');
    return null;
  }
  return id;
}

async function leerJson<S extends z.ZodTypeAny>(
  ctx: ContextoComando,
  esquema: S,
  ruta = ctx.argumentos[0]
): Promise<z.output<S> | null> {
  if (!ruta) {
    ctx.escribir('Se requiere la ruta de un archivo JSON.');
    return null;
  }
  let datos: unknown;
  try {
    datos = JSON.parse(await ctx.leerArchivo(ruta));
  } catch (error) {
    ctx.escribir(`Archivo invalido: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
  const resultado = esquema.safeParse(datos);
  if (!resultado.success) {
    const problema = resultado.error.issues[0];
    ctx.escribir(`Archivo invalido: ${problema?.path.join('.') || 'raiz'}: ${problema?.message ?? 'formato desconocido'}`);
    return null;
  }
  return resultado.data;
}

const COMANDOS: Record<string, Comando> = {
  examenes: {
    seccion: 'examenes',
    descripcion: 'Lista los examenes registrados',
    async ejecutar(ctx) {
      const examenes = await ctx.servicios.examenes.listar();
      if (!examenes.ok) return reportarError(ctx, examenes.error);
      if (examenes.valor.length === 0) {
        ctx.escribir('No hay examenes registrados.');
        return 0;
      }
      escribirLineas(ctx, formatearTabla(aFilasTabla(examenes.valor, COLUMNAS_OCULTAS_EXAMEN)));
      return 0;
    }
  },
  preguntas: {
    seccion: 'examenes',
    descripcion: 'Lista las preguntas de un examen: preguntas <id>',
    async ejecutar(ctx) {
      const id = leerId(ctx);
      if (id === null) return 2;
      const preguntas = await ctx.servicios.preguntas.listarDeExamen(id);
      if (!preguntas.ok) return reportarError(ctx, preguntas.error);
      if (preguntas.valor.length === 0) {
        ctx.escribir(`Este examen no tiene preguntas registradas. ID: ${id}`);
        return 0;
      }
      const filas = preguntas.valor.map((pregunta) => ({
        id: pregunta.id,
        textoPregunta: pregunta.textoPregunta,
        tipoPregunta: pregunta.tipoPregunta,
        puntos: pregunta.puntos,
        opciones: pregunta.opciones.map((opcion) => opcion.texto).join(' / ')
      }));
      escribirLineas(ctx, formatearTabla(aFilasTabla(filas)));
      return 0;
    }
  },
  crear: {
    seccion: 'examenes',
    descripcion: 'Crea un examen y sus preguntas desde un archivo JSON: crear <archivo>',
    async ejecutar(ctx) {
      const archivo = await leerJson(ctx, esquemaArchivoCreacion);
      if (!archivo) return 2;
      const creacion = await ctx.servicios.creacion.crearExamenConPreguntas(archivo.examen, archivo.preguntas);
      if (!creacion.ok) return reportarError(ctx, creacion.error);
      ctx.escribir(resumirCreacion(creacion.valor));
      return creacion.valor.preguntas.every((resultado) => resultado.ok) ? 0 : 1;
    }
  },
  editar: {
    seccion: 'examenes',
    descripcion: 'Cambia titulo, descripcion o fechas de un examen: editar <id> <archivo>',
    async ejecutar(ctx) {
      const id = leerId(ctx);
      if (id === null) return 2;
      const cambios = await leerJson(ctx, esquemaArchivoEdicion, ctx.argumentos[1]);
      if (!cambios) return 2;

      const examenes = await ctx.servicios.examenes.listar();
      if (!examenes.ok) return reportarError(ctx, examenes.error);
      const actual = examenes.valor.find((examen) => examen.id === id);
      if (!actual) {
        ctx.escribir(`No existe el examen ${id}.`);
        return 2;
      }

      // PUT de reemplazo completo: creador y preguntas se reenvian.
      const actualizado = await ctx.servicios.examenes.actualizar(id, aplicarEdicion(actual, cambios));
      if (!actualizado.ok) return reportarError(ctx, actualizado.error);
      ctx.escribir(`Examen ${id} actualizado.`);
      return 0;
    }
  },
  eliminar: {
    seccion: 'examenes',
    descripcion: 'Elimina un examen: eliminar <id>',
    async ejecutar(ctx) {
      const id = leerId(ctx);
      if (id === null) return 2;
      const eliminado = await ctx.servicios.examenes.eliminar(id);
      if (!eliminado.ok) return reportarError(ctx, eliminado.error);
      ctx.escribir(`Examen ${id} eliminado.`);
      return 0;
    }
  },
  activos: {
    seccion: 'realizarExamen',
    descripcion: 'Lista los examenes disponibles para responder hoy',
    async ejecutar(ctx) {
      const activos = await ctx.servicios.examenes.listarActivos(ctx.hoy());
      if (!activos.ok) return reportarError(ctx, activos.error);
      if (activos.valor.length === 0) {
        ctx.escribir('No hay examenes disponibles actualmente.');
        return 0;
      }
      const filas = activos.valor.map(({ id, titulo, fechaInicio, fechaFin }) => ({ id, titulo, fechaInicio, fechaFin }));
      escribirLineas(ctx, formatearTabla(aFilasTabla(filas)));
      return 0;
    }
  },
  enviar: {
    seccion: 'realizarExamen',
    descripcion: 'Responde y envia un examen activo desde un archivo JSON: enviar <archivo>',
    async ejecutar(ctx) {
      const archivo = await leerJson(ctx, esquemaArchivoRespuestas);
      if (!archivo) return 2;

      const activos = await ctx.servicios.examenes.listarActivos(ctx.hoy());
      if (!activos.ok) return reportarError(ctx, activos.error);
      if (!activos.valor.some((examen) => examen.id === archivo.examenId)) {
        ctx.escribir(`El examen ${archivo.examenId} no esta disponible para responder.`);
        return 1;
      }

      const preguntas = await ctx.servicios.preguntas.listarDeExamen(archivo.examenId);
      if (!preguntas.ok) return reportarError(ctx, preguntas.error);

      const sesionRespuestas = ctx.sesion.abrirExamen(archivo.examenId);
      for (const [preguntaId, respuesta] of Object.entries(archivo.respuestas)) {
        sesionRespuestas.registrar(Number(preguntaId), respuesta);
      }

      const enviado = await ctx.servicios.envio.enviarRespuestas(sesionRespuestas, preguntas.valor);
      if (!enviado.ok) return reportarError(ctx, enviado.error);
      ctx.escribir(
        `Examen enviado. Opciones seleccionadas: ${enviado.valor.opcionesSeleccionadas.length}, respuestas de texto: ${enviado.valor.respuestasTexto.length}.`
      );
      return 0;
    }
  },
  estadisticas: {
    seccion: 'estadisticas',
    descripcion: 'Cuenta los examenes por mes de cierre',
    async ejecutar(ctx) {
      const examenes = await ctx.servicios.examenes.listar();
      if (!examenes.ok) return reportarError(ctx, examenes.error);
      if (examenes.valor.length === 0) {
        ctx.escribir('No hay examenes que mostrar.');
        return 0;
      }
      ctx.escribir('Mes\tExamenes');
      for (const { etiqueta, cantidad } of contarExamenesPorMes(examenes.valor)) {
        ctx.escribir(`${etiqueta}\t${cantidad}`);
      }
      return 0;
    }
  },
  usuarios: {
    seccion: 'usuarios',
    descripcion: 'Lista los usuarios registrados',
    async ejecutar(ctx) {
      const usuarios = await ctx.servicios.usuarios.listar();
      if (!usuarios.ok) return reportarError(ctx, usuarios.error);
      if (usuarios.valor.length === 0) {
        ctx.escribir('No hay usuarios registrados.');
        return 0;
      }
      escribirLineas(ctx, formatearTabla(aFilasTabla(usuarios.valor, COLUMNAS_OCULTAS_EXAMEN)));
      return 0;
    }
  }
};

function escribirAyuda(deps: DependenciasComandos, sesion?: SesionPanel) {
  deps.escribir('Uso: panel <rol> <comando> [argumentos...]');
  deps.escribir(`Roles: ${ROLES.join(', ')}`);
  if (!sesion) return;
  deps.escribir(`Menu: ${sesion.menu().map((seccion) => ETIQUETAS_SECCION[seccion]).join(', ')}`);
  for (const [nombre, comando] of Object.entries(COMANDOS)) {
    if (sesion.puedeAcceder(comando.seccion)) deps.escribir(`  ${nombre}\t${comando.descripcion}`);
  }
}

export async function ejecutarPanel(argumentos: readonly string[], deps: DependenciasComandos): Promise<number> {
  const [rol, nombreComando, ...resto] = argumentos;
  if (!rol || !esRolPanel(rol)) {
    if (rol) deps.escribir(`Rol desconocido: ${rol}`);
    escribirAyuda(deps);
    return 2;
  }

  const sesion = crearSesionPanel(rol);
  if (!nombreComando || nombreComando === 'ayuda') {
    escribirAyuda(deps, sesion);
    return nombreComando ? 0 : 2;
  }

  const comando = Object.prototype.hasOwnProperty.call(COMANDOS, nombreComando) ? COMANDOS[nombreComando] : undefined;
  if (!comando) {
    deps.escribir(`Comando desconocido: ${nombreComando}`);
    escribirAyuda(deps, sesion);
    return 2;
  }

  if (!sesion.puedeAcceder(comando.seccion)) {
    deps.escribir(`La seccion ${ETIQUETAS_SECCION[comando.seccion]} no esta disponible para el rol ${rol}.`);
    return 1;
  }

  return comando.ejecutar({ ...deps, sesion, argumentos: resto });
}
